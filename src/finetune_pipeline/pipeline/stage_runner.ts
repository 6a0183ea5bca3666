/**
 * Stage runner
 *
 * Launches one external collaborator (captioning, preprocessing, training) and waits
 * for it to finish. Output is teed to the operator's terminal while the stderr tail
 * is kept as the diagnostic on the returned StageResult.
 */

import { spawn, type SpawnOptions } from "node:child_process";

import type { StageCommand, StageResult } from "./contracts";
import { formatCommandLine } from "./stage_commands";

export type StageProcess = {
  stdout: NodeJS.ReadableStream | null;
  stderr: NodeJS.ReadableStream | null;
  on(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
};

export type SpawnStageProcess = (command: string, args: string[], options: SpawnOptions) => StageProcess;

export type RunStageOptions = {
  spawn?: SpawnStageProcess;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  diagnostic_tail_chars?: number;
  output?: {
    stdout: NodeJS.WritableStream;
    stderr: NodeJS.WritableStream;
  };
};

function appendTail(current: string, chunk: string, limit: number): string {
  const next = current + chunk;
  return next.length > limit ? next.slice(next.length - limit) : next;
}

export function runStage(command: StageCommand, options: RunStageOptions = {}): Promise<StageResult> {
  const spawnProcess: SpawnStageProcess = options.spawn ?? spawn;
  const output = options.output ?? { stdout: process.stdout, stderr: process.stderr };
  const tailLimit = options.diagnostic_tail_chars ?? 4000;
  const commandLine = formatCommandLine(command);
  const startedAt = Date.now();

  return new Promise<StageResult>((resolve) => {
    let stderrTail = "";
    let settled = false;

    const finish = (result: Omit<StageResult, "stage" | "command_line" | "duration_ms">) => {
      if (settled) return;
      settled = true;
      resolve({
        stage: command.stage,
        command_line: commandLine,
        duration_ms: Date.now() - startedAt,
        ...result,
      });
    };

    let proc: StageProcess;
    try {
      proc = spawnProcess(command.command, command.args, {
        cwd: options.cwd,
        env: options.env ?? process.env,
        stdio: ["inherit", "pipe", "pipe"],
      });
    } catch (error) {
      finish({
        ok: false,
        exit_code: null,
        signal: null,
        diagnostic: `Failed to launch ${command.stage}: ${error instanceof Error ? error.message : String(error)}`,
      });
      return;
    }

    proc.stdout?.on("data", (chunk: Buffer | string) => {
      output.stdout.write(chunk);
    });

    proc.stderr?.on("data", (chunk: Buffer | string) => {
      output.stderr.write(chunk);
      stderrTail = appendTail(stderrTail, chunk.toString(), tailLimit);
    });

    proc.on("close", (code, signal) => {
      if (code === 0) {
        finish({ ok: true, exit_code: 0, signal: null, diagnostic: stderrTail || null });
        return;
      }

      const reason = signal ? `terminated by signal ${signal}` : `exit code ${code ?? "unknown"}`;
      finish({
        ok: false,
        exit_code: code,
        signal,
        diagnostic: stderrTail ? `${reason}\n${stderrTail}` : reason,
      });
    });

    proc.on("error", (error) => {
      finish({
        ok: false,
        exit_code: null,
        signal: null,
        diagnostic: `Failed to launch ${command.stage}: ${error.message}`,
      });
    });
  });
}
