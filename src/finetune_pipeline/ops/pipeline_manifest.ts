import fs from "node:fs";
import path from "node:path";

import type { PipelineState, RunRequest, StageName } from "../pipeline/contracts";
import type { StepFailureArtifact } from "../pipeline/errors";
import type { OpsLogEntry } from "./ops_logger";

export const PIPELINE_MANIFEST_FILE = "pipeline_manifest.json";

export type StageSummary = {
  stage: StageName;
  status: "succeeded" | "failed" | "skipped";
  command_line: string;
  exit_code: number | null;
  duration_ms: number | null;
};

export type PipelineManifest = {
  version: "finetune_pipeline_v1";
  started_at: string;
  finished_at: string | null;
  status: "running" | "completed" | "failed";
  dry_run: boolean;
  request: RunRequest;
  output_dir: string;
  captions_path: string;
  derived_config_path: string | null;
  states: PipelineState[];
  stages: StageSummary[];
  diagnostics: string[];
  failure: StepFailureArtifact | null;
  logs: OpsLogEntry[];
};

export function resolvePipelineManifestPath(outputDir: string): string {
  return path.join(outputDir, PIPELINE_MANIFEST_FILE);
}

export function writePipelineManifest(manifestPath: string, manifest: PipelineManifest): string {
  fs.mkdirSync(path.dirname(manifestPath), { recursive: true });
  fs.writeFileSync(manifestPath, JSON.stringify(manifest, null, 2));
  return manifestPath;
}
