import path from "node:path";

import type { PipelineEnvConfig } from "../ops/pipeline_env";
import type { RunRequest, StageCommand } from "./contracts";

type ToolConfig = Pick<PipelineEnvConfig, "python" | "scriptsDir">;

export const STAGE_SCRIPTS = {
  captioning: "caption_videos.py",
  preprocessing: "preprocess_dataset.py",
  training: "train.py",
} as const;

export function buildCaptioningCommand(
  request: Pick<RunRequest, "dataset_dir" | "captioner_type">,
  captionsPath: string,
  tools: ToolConfig
): StageCommand {
  return {
    stage: "captioning",
    command: tools.python,
    args: [
      path.join(tools.scriptsDir, STAGE_SCRIPTS.captioning),
      request.dataset_dir,
      "--output",
      captionsPath,
      "--captioner-type",
      request.captioner_type,
    ],
  };
}

export function buildPreprocessingCommand(
  request: Pick<RunRequest, "caption_column" | "video_column" | "id_token" | "resolution_buckets">,
  captionsPath: string,
  tools: ToolConfig
): StageCommand {
  return {
    stage: "preprocessing",
    command: tools.python,
    args: [
      path.join(tools.scriptsDir, STAGE_SCRIPTS.preprocessing),
      captionsPath,
      "--caption-column",
      request.caption_column,
      "--video-column",
      request.video_column,
      "--id-token",
      request.id_token,
      "--resolution-buckets",
      request.resolution_buckets,
    ],
  };
}

export function buildTrainingCommand(derivedConfigPath: string, tools: ToolConfig): StageCommand {
  return {
    stage: "training",
    command: tools.python,
    args: [path.join(tools.scriptsDir, STAGE_SCRIPTS.training), derivedConfigPath],
  };
}

function quoteArg(arg: string): string {
  if (arg.length > 0 && !/[\s"'\\]/.test(arg)) return arg;
  return `"${arg.replace(/(["\\])/g, "\\$1")}"`;
}

export function formatCommandLine(command: Pick<StageCommand, "command" | "args">): string {
  return [command.command, ...command.args].map(quoteArg).join(" ");
}
