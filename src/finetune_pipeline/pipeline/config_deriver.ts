import fs from "node:fs";
import path from "node:path";

import { parse as parseYaml, stringify as stringifyYaml } from "yaml";

import type { RunRequest, TrainingConfig } from "./contracts";
import { ConfigLoadError, IoError, ValidationParseError } from "./errors";
import { parseResolutionSpec, toVideoDims } from "./resolution";

const STEP = "config_derivation";

export type ConfigFormat = "yaml" | "json";

export type DerivationInput = {
  request: Pick<
    RunRequest,
    "dataset_dir" | "id_token" | "resolution_buckets" | "preprocessed_data_root" | "video_dims"
  >;
  output_dir: string;
};

export type DerivationResult = {
  config: TrainingConfig;
  diagnostics: string[];
};

export type VideoDimsResolution =
  | { source: "override" | "resolution_buckets"; video_dims: [number, number, number] }
  | { source: "base_config"; video_dims: unknown; diagnostic: string | null };

export type DerivedRunConfig = DerivationResult & {
  derived_config_path: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Integers beyond 2^53 stay bigint so the derived copy keeps them exact.
function keepLargeIntegers(_key: unknown, value: unknown): unknown {
  if (typeof value === "bigint" && value >= BigInt(Number.MIN_SAFE_INTEGER) && value <= BigInt(Number.MAX_SAFE_INTEGER)) {
    return Number(value);
  }
  return value;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function configFormatFor(filePath: string): ConfigFormat {
  return path.extname(filePath).toLowerCase() === ".json" ? "json" : "yaml";
}

export function parseBaseConfig(raw: string, format: ConfigFormat, source = "base config"): TrainingConfig {
  let parsed: unknown;
  try {
    parsed = format === "json" ? JSON.parse(raw) : parseYaml(raw, keepLargeIntegers, { intAsBigInt: true });
  } catch (error) {
    throw new ConfigLoadError({
      step_name: STEP,
      reason: `Could not parse ${source}: ${messageOf(error)}`,
      cause: error,
    });
  }

  if (!isRecord(parsed)) {
    throw new ConfigLoadError({ step_name: STEP, reason: `${source} must be a mapping at the top level.` });
  }

  const { data, validation } = parsed;
  if (!isRecord(data) || !isRecord(validation)) {
    const missing = [isRecord(data) ? null : "data", isRecord(validation) ? null : "validation"].filter(
      (section): section is string => section !== null
    );
    throw new ConfigLoadError({
      step_name: STEP,
      reason: `${source} is missing required section(s): ${missing.join(", ")}.`,
    });
  }

  return { ...parsed, data, validation };
}

export function loadBaseConfig(configPath: string): TrainingConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, "utf8");
  } catch (error) {
    throw new IoError({
      step_name: STEP,
      reason: `Could not read base config ${configPath}: ${messageOf(error)}`,
      cause: error,
    });
  }
  return parseBaseConfig(raw, configFormatFor(configPath), configPath);
}

export function parseVideoDimsOverride(value: string, stepName = STEP): [number, number, number] {
  const parsed = parseResolutionSpec(value);
  if (!parsed.ok) {
    throw new ValidationParseError({
      step_name: stepName,
      input: value,
      reason: `Invalid --video-dims: ${parsed.error}`,
    });
  }
  return toVideoDims(parsed.spec);
}

/**
 * Explicit override first, then the resolution-bucket string, then whatever the base
 * config already holds. Only a malformed explicit override is fatal.
 */
export function resolveValidationVideoDims(params: {
  video_dims?: string;
  resolution_buckets: string;
  current: unknown;
}): VideoDimsResolution {
  if (params.video_dims !== undefined) {
    return { source: "override", video_dims: parseVideoDimsOverride(params.video_dims) };
  }

  const fromBuckets = parseResolutionSpec(params.resolution_buckets);
  if (fromBuckets.ok) {
    return { source: "resolution_buckets", video_dims: toVideoDims(fromBuckets.spec) };
  }

  return {
    source: "base_config",
    video_dims: params.current,
    diagnostic: `Resolution buckets are not usable as validation.video_dims, keeping the base value: ${fromBuckets.error}`,
  };
}

/** Pure: the base document is left untouched and a new document is returned. */
export function deriveTrainingConfig(base: TrainingConfig, input: DerivationInput): DerivationResult {
  const config = structuredClone(base);
  const diagnostics: string[] = [];
  const { request } = input;

  config.data.preprocessed_data_root =
    request.preprocessed_data_root ?? path.join(request.dataset_dir, ".precomputed");

  config.output_dir = input.output_dir;

  const dims = resolveValidationVideoDims({
    video_dims: request.video_dims,
    resolution_buckets: request.resolution_buckets,
    current: base.validation.video_dims,
  });
  if (dims.source === "base_config") {
    if (dims.diagnostic) diagnostics.push(dims.diagnostic);
  } else {
    config.validation.video_dims = dims.video_dims;
  }

  config.data.training_token = request.id_token;

  return { config, diagnostics };
}

export function resolveDerivedConfigPath(configPath: string, outputDir: string): string {
  const ext = path.extname(configPath);
  const stem = path.basename(configPath, ext);
  return path.join(outputDir, `${stem}_updated${ext || ".yaml"}`);
}

export function serializeConfig(config: TrainingConfig, format: ConfigFormat): string {
  return format === "json" ? `${JSON.stringify(config, null, 2)}\n` : stringifyYaml(config);
}

export function writeDerivedConfig(params: {
  config: TrainingConfig;
  derived_config_path: string;
  base_config_path: string;
}): string {
  if (path.resolve(params.derived_config_path) === path.resolve(params.base_config_path)) {
    throw new IoError({
      step_name: STEP,
      reason: `Refusing to overwrite the base config ${params.base_config_path}.`,
    });
  }

  try {
    fs.mkdirSync(path.dirname(params.derived_config_path), { recursive: true });
    fs.writeFileSync(
      params.derived_config_path,
      serializeConfig(params.config, configFormatFor(params.derived_config_path))
    );
  } catch (error) {
    throw new IoError({
      step_name: STEP,
      reason: `Could not write derived config ${params.derived_config_path}: ${messageOf(error)}`,
      cause: error,
    });
  }
  return params.derived_config_path;
}

export function deriveRunConfig(
  request: Pick<RunRequest, "config_path"> & DerivationInput["request"],
  outputDir: string
): DerivedRunConfig {
  const base = loadBaseConfig(request.config_path);
  const derived = deriveTrainingConfig(base, { request, output_dir: outputDir });
  const derivedConfigPath = writeDerivedConfig({
    config: derived.config,
    derived_config_path: resolveDerivedConfigPath(request.config_path, outputDir),
    base_config_path: request.config_path,
  });

  return { ...derived, derived_config_path: derivedConfigPath };
}
