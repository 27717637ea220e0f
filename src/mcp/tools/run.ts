import { RunRequestSchema, type RunResponse } from "../tools.js";
import { loadConfig } from "../../config/loadConfig.js";
import { runPipeline } from "../../pipeline/runPipeline.js";
import { parseRequest } from "./input.js";

/**
 * Handles full pipeline runs: writes all four artifacts under `outputDir`
 * and returns both report documents.
 */
export async function handleRun(args: unknown): Promise<RunResponse> {
  const request = parseRequest(RunRequestSchema, args);
  const config = loadConfig();

  const result = await runPipeline({
    inputPath: request.inputPath,
    outputDir: request.outputDir,
    edgeTypes: request.edgeTypes ?? config.extraction.edgeTypes,
    udfEdgeTypes: { cfg: config.udf.cfgEdgeType, call: config.udf.callEdgeType },
    maxIssuesPerCategory: config.verification.maxIssuesPerCategory,
  });

  return {
    artifacts: result.artifacts,
    extraction: result.extractionDocument,
    udf: result.udfDocument,
    overallPassed: result.overallPassed,
  };
}
