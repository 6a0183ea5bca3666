import fs from "node:fs";
import path from "node:path";

import { nanoid } from "nanoid";

import { IoError } from "./errors";

export type AllocateRunDirectoryOptions = {
  base_dir: string;
  now: Date;
  unique_suffix?: boolean;
  suffix_factory?: () => string;
};

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Local wall-clock stamp, second granularity: `YYYYMMDD_HHMMSS`. */
export function toRunStamp(value: Date): string {
  const date = `${pad(value.getFullYear(), 4)}${pad(value.getMonth() + 1)}${pad(value.getDate())}`;
  const time = `${pad(value.getHours())}${pad(value.getMinutes())}${pad(value.getSeconds())}`;
  return `${date}_${time}`;
}

export function toRunDirectoryName(now: Date, suffix?: string): string {
  const name = `train_${toRunStamp(now)}`;
  return suffix ? `${name}_${suffix}` : name;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Creates `<base_dir>/train_<YYYYMMDD_HHMMSS>[_<suffix>]`. Parents are created as
 * needed; the leaf must not exist yet. Two runs landing on the same second fail with
 * RUN_DIRECTORY_COLLISION instead of sharing a directory.
 */
export function allocateRunDirectory(options: AllocateRunDirectoryOptions): string {
  const suffix = options.unique_suffix ? (options.suffix_factory ?? (() => nanoid(6)))() : undefined;
  const runDir = path.join(options.base_dir, toRunDirectoryName(options.now, suffix));

  try {
    fs.mkdirSync(options.base_dir, { recursive: true });
  } catch (error) {
    throw new IoError({
      step_name: "start",
      reason: `Could not create output base directory ${options.base_dir}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      cause: error,
    });
  }

  try {
    fs.mkdirSync(runDir);
  } catch (error) {
    if (errorCode(error) === "EEXIST") {
      throw new IoError({
        code: "RUN_DIRECTORY_COLLISION",
        step_name: "start",
        reason: `Run directory ${runDir} already exists; another run started in the same second.`,
        next_action: "Rerun in a moment, or pass --unique-suffix to disambiguate run directories.",
        cause: error,
      });
    }
    throw new IoError({
      step_name: "start",
      reason: `Could not create run directory ${runDir}: ${error instanceof Error ? error.message : String(error)}`,
      cause: error,
    });
  }

  return runDir;
}
