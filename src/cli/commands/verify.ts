import { reportFiles } from "../../pipeline/runPipeline.js";
import { readGraphFile, writeJsonArtifact } from "../../pipeline/io.js";
import { verifyExtraction } from "../../verify/extraction.js";
import {
  formatReport,
  toReportDocument,
  type VerificationOutcome,
} from "../../verify/report.js";
import { verifyUdfFilter } from "../../verify/udfFilter.js";
import type { VerifyExtractionOptions, VerifyFilterOptions } from "../types.js";
import { prepareCommand } from "./setup.js";

async function emit(
  title: string,
  outcome: VerificationOutcome,
  files: Record<string, string>,
  reportPath: string | undefined,
): Promise<void> {
  console.log(formatReport(title, outcome.report));
  if (reportPath) {
    await writeJsonArtifact(reportPath, toReportDocument(outcome, files));
  }
  if (!outcome.report.overallPassed) {
    process.exitCode = 1;
  }
}

export async function verifyExtractionCommand(
  options: VerifyExtractionOptions,
): Promise<void> {
  const config = prepareCommand(options);
  const original = await readGraphFile(options.original);
  const subgraph = await readGraphFile(options.subgraph);

  const outcome = verifyExtraction(
    original,
    subgraph,
    options.edgeTypes ?? config.extraction.edgeTypes,
    { maxIssuesPerCategory: config.verification.maxIssuesPerCategory },
  );
  await emit(
    "Extraction verification",
    outcome,
    reportFiles(options.original, original, options.subgraph, subgraph),
    options.report,
  );
}

export async function verifyFilterCommand(options: VerifyFilterOptions): Promise<void> {
  const config = prepareCommand(options);
  const preFilter = await readGraphFile(options.preFilter);
  const filtered = await readGraphFile(options.filtered);

  const outcome = verifyUdfFilter(preFilter, filtered, {
    cfgEdgeType: config.udf.cfgEdgeType,
    callEdgeType: config.udf.callEdgeType,
    maxIssuesPerCategory: config.verification.maxIssuesPerCategory,
  });
  await emit(
    "UDF filter verification",
    outcome,
    reportFiles(options.preFilter, preFilter, options.filtered, filtered),
    options.report,
  );
}
