import { describe, expect, it } from "vitest";

import { getPipelineEnvConfig } from "../pipeline_env";

describe("getPipelineEnvConfig", () => {
  it("defaults to python and the scripts directory", () => {
    expect(getPipelineEnvConfig({})).toEqual({ python: "python", scriptsDir: "scripts", diagnosticTailChars: 4000 });
  });

  it("reads interpreter, scripts dir and tail size from the environment", () => {
    expect(
      getPipelineEnvConfig({
        PIPELINE_PYTHON: "/opt/venv/bin/python",
        PIPELINE_SCRIPTS_DIR: "/opt/trainer/scripts",
        PIPELINE_DIAGNOSTIC_TAIL_CHARS: "120",
      })
    ).toEqual({ python: "/opt/venv/bin/python", scriptsDir: "/opt/trainer/scripts", diagnosticTailChars: 120 });
    expect(getPipelineEnvConfig({ PYTHON_PATH: "python3", PIPELINE_DIAGNOSTIC_TAIL_CHARS: "abc" })).toEqual({
      python: "python3",
      scriptsDir: "scripts",
      diagnosticTailChars: 4000,
    });
  });
});
