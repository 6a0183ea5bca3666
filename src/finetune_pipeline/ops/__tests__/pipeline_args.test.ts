import { describe, expect, it } from "vitest";

import { InvalidArgumentsError } from "../../pipeline/errors";
import { parsePipelineArgs } from "../pipeline_args";

function requestFrom(argv: string[]) {
  const parsed = parsePipelineArgs(argv);
  if (parsed.help) throw new Error("Expected a run request, got --help.");
  return parsed.request;
}

function issuesFrom(argv: string[]): string[] {
  try {
    parsePipelineArgs(argv);
  } catch (error) {
    if (error instanceof InvalidArgumentsError) return error.issues;
    throw error;
  }
  throw new Error("Expected parsePipelineArgs to throw.");
}

describe("parsePipelineArgs", () => {
  it("fills in defaults around the dataset directory", () => {
    expect(requestFrom(["videos"])).toEqual({
      dataset_dir: "videos",
      output_dir_base: "outputs",
      captioner_type: "llava_next_7b",
      caption_column: "caption",
      video_column: "media_path",
      id_token: "T1m3l4ps3",
      resolution_buckets: "768x768x25",
      config_path: "configs/video_lora.yaml",
      dry_run: false,
      unique_suffix: false,
    });
  });

  it("accepts dashed, underscored and inline spellings", () => {
    const request = requestFrom([
      "videos",
      "--video-dims=640x360x9",
      "--id_token",
      "test-token",
      "--preprocessed-data-root",
      "/scratch/precomputed",
      "--captions_output",
      "/tmp/captions.json",
      "--dry-run",
      "--unique_suffix",
    ]);

    expect(request.video_dims).toBe("640x360x9");
    expect(request.id_token).toBe("test-token");
    expect(request.preprocessed_data_root).toBe("/scratch/precomputed");
    expect(request.captions_output).toBe("/tmp/captions.json");
    expect(request.dry_run).toBe(true);
    expect(request.unique_suffix).toBe(true);
  });

  it("keeps number-like dataset directories exactly as typed", () => {
    expect(requestFrom(["0042"]).dataset_dir).toBe("0042");
    expect(requestFrom(["1e3"]).dataset_dir).toBe("1e3");
  });

  it("passes padded values through untouched", () => {
    const request = requestFrom(["videos", "--id-token", " tok ", "--video-dims", " 640x360x9"]);

    expect(request.id_token).toBe(" tok ");
    expect(request.video_dims).toBe(" 640x360x9");
  });

  it("rejects blank values", () => {
    expect(issuesFrom(["videos", "--id-token", "   "])).toEqual(["id_token: must not be blank"]);
  });

  it("returns help without requiring a dataset", () => {
    expect(parsePipelineArgs(["--help"])).toEqual({ help: true });
    expect(parsePipelineArgs(["-h"])).toEqual({ help: true });
  });

  it("requires exactly one dataset directory", () => {
    expect(issuesFrom([])).toContain("Missing required positional argument <dataset_dir>.");
    expect(issuesFrom(["a", "b"])).toContain("Expected one dataset directory, got 2.");
  });

  it("rejects unknown options", () => {
    expect(issuesFrom(["videos", "--epochs", "3"])).toEqual(["Unknown option --epochs."]);
  });

  it("rejects empty values", () => {
    expect(() => parsePipelineArgs(["videos", "--id-token", ""])).toThrowError(InvalidArgumentsError);
  });
});
