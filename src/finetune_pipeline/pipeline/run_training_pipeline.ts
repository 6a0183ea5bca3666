import fs from "node:fs";
import path from "node:path";

import { createOpsLogger, type OpsLogger } from "../ops/ops_logger";
import { getPipelineEnvConfig, type PipelineEnvConfig } from "../ops/pipeline_env";
import {
  resolvePipelineManifestPath,
  writePipelineManifest,
  type PipelineManifest,
  type StageSummary,
} from "../ops/pipeline_manifest";
import { deriveRunConfig, parseVideoDimsOverride, type DerivedRunConfig } from "./config_deriver";
import {
  createRunContext,
  transitionRunContext,
  type PipelineState,
  type RunRequest,
  type StageCommand,
  type StageResult,
} from "./contracts";
import { IoError, StageFailure, toStepFailureArtifact, type StepFailureArtifact } from "./errors";
import { allocateRunDirectory, type AllocateRunDirectoryOptions } from "./run_directory";
import { buildCaptioningCommand, buildPreprocessingCommand, buildTrainingCommand, formatCommandLine } from "./stage_commands";
import { runStage } from "./stage_runner";

export type TrainingPipelineDeps = {
  runStage: (command: StageCommand) => Promise<StageResult>;
  allocateRunDirectory: (options: AllocateRunDirectoryOptions) => string;
  deriveRunConfig: (request: RunRequest, outputDir: string) => DerivedRunConfig;
  now: () => Date;
  logger: OpsLogger;
  env: PipelineEnvConfig;
};

export type PipelineSuccess = {
  ok: true;
  output_dir: string;
  captions_path: string;
  derived_config_path: string;
  manifest_path: string;
  states: PipelineState[];
  stages: StageSummary[];
  diagnostics: string[];
};

export type PipelineFailure = {
  ok: false;
  state_reached: PipelineState;
  output_dir: string | null;
  captions_path: string;
  manifest_path: string | null;
  states: PipelineState[];
  stages: StageSummary[];
  diagnostics: string[];
  error: StepFailureArtifact;
};

export function resolveCaptionsPath(request: Pick<RunRequest, "dataset_dir" | "captions_output">): string {
  return request.captions_output ?? path.join(request.dataset_dir, "captions.json");
}

function assertDatasetReadable(datasetDir: string) {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(datasetDir);
    fs.accessSync(datasetDir, fs.constants.R_OK);
  } catch (error) {
    throw new IoError({
      step_name: "start",
      reason: `Dataset directory ${datasetDir} is not readable: ${error instanceof Error ? error.message : String(error)}`,
      next_action: "Point the pipeline at an existing, readable dataset directory.",
      cause: error,
    });
  }
  if (!stats.isDirectory()) {
    throw new IoError({
      step_name: "start",
      reason: `Dataset path ${datasetDir} is not a directory.`,
      next_action: "Point the pipeline at an existing, readable dataset directory.",
    });
  }
}

function assertCaptionsWritten(captionsPath: string) {
  const stats = fs.existsSync(captionsPath) ? fs.statSync(captionsPath) : null;
  let problem: string | null = null;
  if (!stats) problem = `did not write ${captionsPath}`;
  else if (!stats.isFile()) problem = `left ${captionsPath} as something other than a file`;
  else if (stats.size === 0) problem = `left ${captionsPath} empty`;

  if (problem) {
    throw new StageFailure({
      step_name: "captioning",
      exit_code: 0,
      reason: `Captioning exited cleanly but ${problem}.`,
    });
  }
}

function toStageSummary(result: StageResult): StageSummary {
  return {
    stage: result.stage,
    status: result.ok ? "succeeded" : "failed",
    command_line: result.command_line,
    exit_code: result.exit_code,
    duration_ms: result.duration_ms,
  };
}

/**
 * Runs captioning, preprocessing, config derivation and training strictly in order.
 * The first fatal error moves the run to `failed` and nothing after it is launched.
 */
export async function runTrainingPipeline(
  request: RunRequest,
  deps: Partial<TrainingPipelineDeps> = {}
): Promise<PipelineSuccess | PipelineFailure> {
  const env = deps.env ?? getPipelineEnvConfig();
  const d: TrainingPipelineDeps = {
    runStage: (command) => runStage(command, { diagnostic_tail_chars: env.diagnosticTailChars }),
    allocateRunDirectory,
    deriveRunConfig,
    now: () => new Date(),
    logger: createOpsLogger("pipeline"),
    ...deps,
    env,
  };
  const logger = d.logger;
  const context = createRunContext(resolveCaptionsPath(request));
  const stages: StageSummary[] = [];
  const diagnostics: string[] = [];
  const startedAt = d.now().toISOString();
  let manifestPath: string | null = null;

  const persistManifest = (status: PipelineManifest["status"], failure: StepFailureArtifact | null) => {
    if (!context.output_dir || !manifestPath) return;
    writePipelineManifest(manifestPath, {
      version: "finetune_pipeline_v1",
      started_at: startedAt,
      finished_at: status === "running" ? null : d.now().toISOString(),
      status,
      dry_run: request.dry_run,
      request,
      output_dir: context.output_dir,
      captions_path: context.captions_path,
      derived_config_path: context.derived_config_path,
      states: [...context.history],
      stages: [...stages],
      diagnostics: [...diagnostics],
      failure,
      logs: [...logger.entries],
    });
  };

  const executeStage = async (command: StageCommand) => {
    const commandLine = formatCommandLine(command);
    logger.info(`Running ${command.stage}: ${commandLine}`);

    if (request.dry_run) {
      logger.info(`Dry run: ${command.stage} not launched.`);
      stages.push({ stage: command.stage, status: "skipped", command_line: commandLine, exit_code: null, duration_ms: null });
      return;
    }

    const result = await d.runStage(command);
    stages.push(toStageSummary(result));
    if (!result.ok) {
      throw new StageFailure({
        step_name: command.stage,
        exit_code: result.exit_code,
        reason: `${command.stage} failed (${result.diagnostic ?? `exit code ${result.exit_code ?? "unknown"}`}).`,
      });
    }
    logger.info(`${command.stage} finished in ${result.duration_ms}ms.`);
  };

  try {
    assertDatasetReadable(request.dataset_dir);
    if (request.video_dims !== undefined) {
      parseVideoDimsOverride(request.video_dims, "start");
    }

    const outputDir = d.allocateRunDirectory({
      base_dir: request.output_dir_base,
      now: d.now(),
      unique_suffix: request.unique_suffix,
    });
    context.output_dir = outputDir;
    manifestPath = resolvePipelineManifestPath(outputDir);
    logger.info(`Training output directory: ${outputDir}`);
    persistManifest("running", null);

    transitionRunContext(context, "captioning");
    await executeStage(buildCaptioningCommand(request, context.captions_path, d.env));
    if (!request.dry_run) {
      assertCaptionsWritten(context.captions_path);
    }

    transitionRunContext(context, "preprocessing");
    await executeStage(buildPreprocessingCommand(request, context.captions_path, d.env));

    transitionRunContext(context, "config_derivation");
    const derived = d.deriveRunConfig(request, outputDir);
    for (const diagnostic of derived.diagnostics) {
      logger.warn(diagnostic);
      diagnostics.push(diagnostic);
    }
    context.derived_config_path = derived.derived_config_path;
    logger.info(`Updated training config saved to: ${derived.derived_config_path}`);

    transitionRunContext(context, "training");
    await executeStage(buildTrainingCommand(derived.derived_config_path, d.env));

    transitionRunContext(context, "done");
    logger.info(`Pipeline complete. Derived config: ${derived.derived_config_path}`);
    persistManifest("completed", null);

    return {
      ok: true,
      output_dir: outputDir,
      captions_path: context.captions_path,
      derived_config_path: derived.derived_config_path,
      manifest_path: resolvePipelineManifestPath(outputDir),
      states: [...context.history],
      stages,
      diagnostics,
    };
  } catch (error) {
    const stateReached = context.state;
    const failure = toStepFailureArtifact(error, stateReached);
    logger.error(`Step ${failure.step_failed} failed: ${failure.reason}`);
    transitionRunContext(context, "failed");

    try {
      persistManifest("failed", failure);
    } catch (manifestError) {
      logger.error(
        `Could not write pipeline manifest: ${manifestError instanceof Error ? manifestError.message : String(manifestError)}`
      );
      manifestPath = null;
    }

    return {
      ok: false,
      state_reached: stateReached,
      output_dir: context.output_dir,
      captions_path: context.captions_path,
      manifest_path: manifestPath,
      states: [...context.history],
      stages,
      diagnostics,
      error: failure,
    };
  }
}
