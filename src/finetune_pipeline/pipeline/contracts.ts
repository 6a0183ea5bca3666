import { z } from "zod";

export const STAGE_NAMES = ["captioning", "preprocessing", "training"] as const;
export type StageName = (typeof STAGE_NAMES)[number];

export const PIPELINE_STATES = [
  "start",
  "captioning",
  "preprocessing",
  "config_derivation",
  "training",
  "done",
  "failed",
] as const;
export type PipelineState = (typeof PIPELINE_STATES)[number];

// Values are passed through untouched; blank ones are rejected.
const NonEmptyString = z.string().refine((value) => value.trim().length > 0, { message: "must not be blank" });

export const RunRequestSchema = z
  .object({
    dataset_dir: NonEmptyString,
    output_dir_base: NonEmptyString,
    captions_output: NonEmptyString.optional(),
    captioner_type: NonEmptyString,
    caption_column: NonEmptyString,
    video_column: NonEmptyString,
    id_token: NonEmptyString,
    resolution_buckets: NonEmptyString,
    config_path: NonEmptyString,
    preprocessed_data_root: NonEmptyString.optional(),
    video_dims: NonEmptyString.optional(),
    dry_run: z.boolean().default(false),
    unique_suffix: z.boolean().default(false),
  })
  .strict();

export type RunRequest = Readonly<z.infer<typeof RunRequestSchema>>;

export type ResolutionSpec = {
  width: number;
  height: number;
  frames: number;
};

/** Nested key/value document; only `data` and `validation` are required to be mappings. */
export type TrainingConfig = {
  data: Record<string, unknown>;
  validation: Record<string, unknown>;
  [key: string]: unknown;
};

export type StageCommand = {
  stage: StageName;
  command: string;
  args: string[];
};

export type StageResult = {
  stage: StageName;
  ok: boolean;
  exit_code: number | null;
  signal: string | null;
  diagnostic: string | null;
  command_line: string;
  duration_ms: number;
};

export type RunContext = {
  captions_path: string;
  output_dir: string | null;
  derived_config_path: string | null;
  state: PipelineState;
  history: PipelineState[];
};

export function createRunContext(captionsPath: string): RunContext {
  return {
    captions_path: captionsPath,
    output_dir: null,
    derived_config_path: null,
    state: "start",
    history: ["start"],
  };
}

export function transitionRunContext(context: RunContext, next: PipelineState): void {
  context.state = next;
  context.history.push(next);
}
