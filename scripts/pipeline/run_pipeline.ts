import { parsePipelineArgs, PIPELINE_USAGE } from "../../src/finetune_pipeline/ops/pipeline_args";
import { InvalidArgumentsError } from "../../src/finetune_pipeline/pipeline/errors";
import { runTrainingPipeline } from "../../src/finetune_pipeline/pipeline/run_training_pipeline";

async function main(): Promise<number> {
  const args = parsePipelineArgs(process.argv.slice(2));
  if (args.help) {
    console.log(PIPELINE_USAGE);
    return 0;
  }

  const result = await runTrainingPipeline(args.request);

  if (!result.ok) {
    console.error(
      JSON.stringify(
        {
          status: "failed",
          step_failed: result.error.step_failed,
          code: result.error.code,
          reason: result.error.reason,
          output_dir: result.output_dir,
          manifest_path: result.manifest_path,
        },
        null,
        2
      )
    );
    console.error(`Next: ${result.error.next_action}`);
    return 1;
  }

  console.log(
    JSON.stringify(
      {
        status: "completed",
        dry_run: args.request.dry_run,
        output_dir: result.output_dir,
        derived_config_path: result.derived_config_path,
        manifest_path: result.manifest_path,
        diagnostics: result.diagnostics,
      },
      null,
      2
    )
  );
  return 0;
}

if (process.argv[1]?.includes("run_pipeline.ts")) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      if (error instanceof InvalidArgumentsError) {
        console.error(error.message);
        console.error(PIPELINE_USAGE);
      } else {
        console.error(error instanceof Error ? error.stack ?? error.message : String(error));
      }
      process.exit(1);
    });
}
