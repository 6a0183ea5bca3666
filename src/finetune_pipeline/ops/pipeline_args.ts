import minimist from "minimist";

import { RunRequestSchema, type RunRequest } from "../pipeline/contracts";
import { InvalidArgumentsError } from "../pipeline/errors";

export const DEFAULT_ID_TOKEN = "T1m3l4ps3";
export const DEFAULT_CONFIG_PATH = "configs/video_lora.yaml";

const STRING_FLAGS = [
  "output_dir_base",
  "captions_output",
  "captioner_type",
  "caption_column",
  "video_column",
  "id_token",
  "resolution_buckets",
  "config_path",
  "preprocessed_data_root",
  "video_dims",
] as const;

const BOOLEAN_FLAGS = ["dry_run", "unique_suffix", "help"] as const;

const DEFAULTS: Partial<Record<(typeof STRING_FLAGS)[number], string>> = {
  output_dir_base: "outputs",
  captioner_type: "llava_next_7b",
  caption_column: "caption",
  video_column: "media_path",
  id_token: DEFAULT_ID_TOKEN,
  resolution_buckets: "768x768x25",
  config_path: DEFAULT_CONFIG_PATH,
};

export const PIPELINE_USAGE = `Usage: run_pipeline <dataset_dir> [options]

Caption videos, preprocess the dataset, derive a run-specific training config and train.

Options:
  --output-dir-base <dir>          Base directory for run outputs (default: outputs)
  --captions-output <file>         Captions file (default: <dataset_dir>/captions.json)
  --captioner-type <name>          Captioner to use (default: llava_next_7b)
  --caption-column <name>          Caption column name (default: caption)
  --video-column <name>            Video path column name (default: media_path)
  --id-token <token>               Training token (default: ${DEFAULT_ID_TOKEN})
  --resolution-buckets <WxHxF>     Resolution buckets (default: 768x768x25)
  --config-path <file>             Base training config (default: ${DEFAULT_CONFIG_PATH})
  --preprocessed-data-root <dir>   Override data.preprocessed_data_root
  --video-dims <WxHxF>             Override validation.video_dims
  --dry-run                        Print stage commands and derive the config without launching stages
  --unique-suffix                  Append a random token to the run directory name
`;

export type PipelineArgs = { help: true } | { help: false; request: RunRequest };

function dashed(key: string): string {
  return key.replace(/_/g, "-");
}

function readString(parsed: minimist.ParsedArgs, key: string): string | undefined {
  const value: unknown = parsed[key] ?? parsed[dashed(key)];
  if (Array.isArray(value)) {
    const last: unknown = value[value.length - 1];
    return typeof last === "string" ? last : undefined;
  }
  return typeof value === "string" ? value : undefined;
}

function readBoolean(parsed: minimist.ParsedArgs, key: string): boolean {
  return parsed[key] === true || parsed[dashed(key)] === true;
}

/** Accepts both `--video-dims` and `--video_dims` spellings. */
export function parsePipelineArgs(argv: string[]): PipelineArgs {
  const parsed = minimist(argv, {
    string: ["_", ...STRING_FLAGS.flatMap((key) => [key, dashed(key)])],
    boolean: BOOLEAN_FLAGS.flatMap((key) => [key, dashed(key)]),
    alias: { h: "help" },
  });

  if (readBoolean(parsed, "help")) {
    return { help: true };
  }

  const known = new Set<string>([
    "_",
    "h",
    ...STRING_FLAGS.flatMap((key) => [key, dashed(key)]),
    ...BOOLEAN_FLAGS.flatMap((key) => [key, dashed(key)]),
  ]);
  const issues = Object.keys(parsed)
    .filter((key) => !known.has(key))
    .map((key) => `Unknown option --${key}.`);

  const positionals = parsed._;
  if (positionals.length === 0) issues.push("Missing required positional argument <dataset_dir>.");
  if (positionals.length > 1) issues.push(`Expected one dataset directory, got ${positionals.length}.`);

  const candidate: Record<string, unknown> = {
    dataset_dir: positionals[0],
    dry_run: readBoolean(parsed, "dry_run"),
    unique_suffix: readBoolean(parsed, "unique_suffix"),
  };
  for (const key of STRING_FLAGS) {
    const value = readString(parsed, key) ?? DEFAULTS[key];
    if (value !== undefined) candidate[key] = value;
  }

  const result = RunRequestSchema.safeParse(candidate);
  if (!result.success) {
    for (const issue of result.error.issues) {
      issues.push(`${issue.path.join(".") || "arguments"}: ${issue.message}`);
    }
  }

  if (issues.length > 0 || !result.success) {
    throw new InvalidArgumentsError({
      step_name: "arguments",
      reason: `Invalid arguments: ${issues.join(" ")}`,
      issues,
    });
  }

  return { help: false, request: result.data };
}
