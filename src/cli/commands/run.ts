import { runPipeline } from "../../pipeline/runPipeline.js";
import { formatReport } from "../../verify/report.js";
import type { RunOptions } from "../types.js";
import { prepareCommand } from "./setup.js";

export async function runCommand(options: RunOptions): Promise<void> {
  const config = prepareCommand(options);

  const result = await runPipeline({
    inputPath: options.input,
    outputDir: options.outputDir,
    edgeTypes: options.edgeTypes ?? config.extraction.edgeTypes,
    udfEdgeTypes: { cfg: config.udf.cfgEdgeType, call: config.udf.callEdgeType },
    maxIssuesPerCategory: config.verification.maxIssuesPerCategory,
  });

  console.log(formatReport("Extraction verification", result.extractionReport.report));
  console.log(formatReport("UDF filter verification", result.udfReport.report));
  console.log("");
  console.log("Artifacts:");
  for (const path of Object.values(result.artifacts)) {
    console.log(`  ${path}`);
  }

  if (!result.overallPassed) {
    process.exitCode = 1;
  }
}
