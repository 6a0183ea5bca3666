export type PipelineErrorCode =
  | "IO_ERROR"
  | "RUN_DIRECTORY_COLLISION"
  | "CONFIG_LOAD_ERROR"
  | "VALIDATION_PARSE_ERROR"
  | "STAGE_FAILURE"
  | "INVALID_ARGUMENTS";

export type StepFailureArtifact = {
  step_failed: string;
  code: PipelineErrorCode | "UNEXPECTED";
  reason: string;
  next_action: string;
};

type PipelineErrorParams = {
  step_name: string;
  reason: string;
  next_action?: string;
  cause?: unknown;
};

export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly step_name: string;
  readonly next_action: string;

  constructor(code: PipelineErrorCode, params: PipelineErrorParams) {
    super(params.reason, params.cause === undefined ? undefined : { cause: params.cause });
    this.name = "PipelineError";
    this.code = code;
    this.step_name = params.step_name;
    this.next_action = params.next_action ?? "Review the pipeline log for the failing step and rerun.";
  }

  toFailureArtifact(): StepFailureArtifact {
    return {
      step_failed: this.step_name,
      code: this.code,
      reason: this.message,
      next_action: this.next_action,
    };
  }
}

export class IoError extends PipelineError {
  constructor(params: PipelineErrorParams & { code?: "IO_ERROR" | "RUN_DIRECTORY_COLLISION" }) {
    super(params.code ?? "IO_ERROR", {
      next_action: "Check that the path exists and is writable, then rerun.",
      ...params,
    });
    this.name = "IoError";
  }
}

export class ConfigLoadError extends PipelineError {
  constructor(params: PipelineErrorParams) {
    super("CONFIG_LOAD_ERROR", {
      next_action: "Fix the base training config (it needs `data` and `validation` sections) and rerun.",
      ...params,
    });
    this.name = "ConfigLoadError";
  }
}

export class ValidationParseError extends PipelineError {
  readonly input: string;

  constructor(params: PipelineErrorParams & { input: string }) {
    super("VALIDATION_PARSE_ERROR", {
      next_action: "Pass --video-dims as WxHxF with three positive integers, e.g. 768x768x89.",
      ...params,
    });
    this.name = "ValidationParseError";
    this.input = params.input;
  }
}

export class StageFailure extends PipelineError {
  readonly exit_code: number | null;

  constructor(params: PipelineErrorParams & { exit_code: number | null }) {
    super("STAGE_FAILURE", {
      next_action: `Inspect the ${params.step_name} output above, fix the cause and rerun the pipeline.`,
      ...params,
    });
    this.name = "StageFailure";
    this.exit_code = params.exit_code;
  }
}

export class InvalidArgumentsError extends PipelineError {
  readonly issues: string[];

  constructor(params: PipelineErrorParams & { issues: string[] }) {
    super("INVALID_ARGUMENTS", {
      next_action: "Fix the command-line arguments and rerun.",
      ...params,
    });
    this.name = "InvalidArgumentsError";
    this.issues = params.issues;
  }
}

export function toStepFailureArtifact(error: unknown, stepName: string): StepFailureArtifact {
  if (error instanceof PipelineError) {
    return error.toFailureArtifact();
  }

  const reason = error instanceof Error ? error.message : String(error);
  return {
    step_failed: stepName,
    code: "UNEXPECTED",
    reason,
    next_action: "Review the pipeline log for the failing step and rerun.",
  };
}
