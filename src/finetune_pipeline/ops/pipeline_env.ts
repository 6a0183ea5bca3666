/**
 * Pipeline Environment Configuration
 */
export interface PipelineEnvConfig {
  python: string;
  scriptsDir: string;
  diagnosticTailChars: number;
}

export function getPipelineEnvConfig(env: NodeJS.ProcessEnv = process.env): PipelineEnvConfig {
  const tail = parseInt(env.PIPELINE_DIAGNOSTIC_TAIL_CHARS ?? "4000", 10);
  return {
    python: env.PIPELINE_PYTHON || env.PYTHON_PATH || "python",
    scriptsDir: env.PIPELINE_SCRIPTS_DIR || "scripts",
    diagnosticTailChars: Number.isFinite(tail) && tail > 0 ? tail : 4000,
  };
}
