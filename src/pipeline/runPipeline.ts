/**
 * Single-graph runner: reads one export, writes the four artifacts next to
 * each other in `outputDir` and returns what it wrote.
 *
 * @module pipeline/runPipeline
 */

import { join } from "path";
import {
  EXTRACTION_REPORT_SUFFIX,
  SUBGRAPH_SUFFIX,
  UDF_FILTERED_SUFFIX,
  UDF_REPORT_SUFFIX,
} from "../config/constants.js";
import { edgeTypesLabel } from "../slice/extract.js";
import type { EdgeTypeNames } from "../slice/retention.js";
import { hashContent } from "../util/hashing.js";
import { logger } from "../util/logger.js";
import { toReportDocument, type ReportDocument } from "../verify/report.js";
import { readGraphFile, writeArtifact, writeJsonArtifact } from "./io.js";
import { processGraphText, type ProcessResult } from "./stages.js";

export interface PipelineOptions {
  inputPath: string;
  outputDir: string;
  edgeTypes: readonly string[];
  udfEdgeTypes?: EdgeTypeNames;
  maxIssuesPerCategory?: number;
}

export interface PipelineArtifacts {
  subgraph: string;
  extractionReport: string;
  filtered: string;
  udfReport: string;
}

export interface PipelineResult extends ProcessResult {
  artifacts: PipelineArtifacts;
  extractionDocument: ReportDocument;
  udfDocument: ReportDocument;
  overallPassed: boolean;
}

export function artifactPaths(outputDir: string, edgeTypes: readonly string[]): PipelineArtifacts {
  const prefix = edgeTypesLabel(edgeTypes);
  return {
    subgraph: join(outputDir, `${prefix}${SUBGRAPH_SUFFIX}`),
    extractionReport: join(outputDir, `${prefix}${EXTRACTION_REPORT_SUFFIX}`),
    filtered: join(outputDir, `${prefix}${UDF_FILTERED_SUFFIX}`),
    udfReport: join(outputDir, `${prefix}${UDF_REPORT_SUFFIX}`),
  };
}

export function reportFiles(
  originalPath: string,
  originalText: string,
  filteredPath: string,
  filteredText: string,
): Record<string, string> {
  return {
    original_dot: originalPath,
    original_sha256: hashContent(originalText),
    filtered_dot: filteredPath,
    filtered_sha256: hashContent(filteredText),
  };
}

export async function runPipeline(options: PipelineOptions): Promise<PipelineResult> {
  const input = await readGraphFile(options.inputPath);
  const artifacts = artifactPaths(options.outputDir, options.edgeTypes);

  logger.info("Processing graph", {
    input: options.inputPath,
    edgeTypes: options.edgeTypes.join(","),
  });

  const result = processGraphText(input, {
    edgeTypes: options.edgeTypes,
    udfEdgeTypes: options.udfEdgeTypes,
    maxIssuesPerCategory: options.maxIssuesPerCategory,
  });

  const extractionDocument = toReportDocument(
    result.extractionReport,
    reportFiles(options.inputPath, input, artifacts.subgraph, result.subgraphText),
  );
  const udfDocument = toReportDocument(
    result.udfReport,
    reportFiles(artifacts.subgraph, result.subgraphText, artifacts.filtered, result.filteredText),
  );

  await writeArtifact(artifacts.subgraph, result.subgraphText);
  await writeJsonArtifact(artifacts.extractionReport, extractionDocument);
  await writeArtifact(artifacts.filtered, result.filteredText);
  await writeJsonArtifact(artifacts.udfReport, udfDocument);

  const overallPassed =
    result.extractionReport.report.overallPassed && result.udfReport.report.overallPassed;
  if (overallPassed) {
    logger.info("Verification passed", { outputDir: options.outputDir });
  } else {
    logger.warn("Verification failed", {
      extraction: result.extractionReport.report.overallPassed,
      udf: result.udfReport.report.overallPassed,
    });
  }

  return { ...result, artifacts, extractionDocument, udfDocument, overallPassed };
}
