import {
  VerifyExtractionRequestSchema,
  VerifyFilterRequestSchema,
  type VerifyResponse,
} from "../tools.js";
import { loadConfig } from "../../config/loadConfig.js";
import { reportFiles } from "../../pipeline/runPipeline.js";
import { verifyExtraction } from "../../verify/extraction.js";
import { toReportDocument } from "../../verify/report.js";
import { verifyUdfFilter } from "../../verify/udfFilter.js";
import { parseRequest, resolveGraphInput } from "./input.js";

export async function handleVerifyExtraction(args: unknown): Promise<VerifyResponse> {
  const request = parseRequest(VerifyExtractionRequestSchema, args);
  const config = loadConfig();
  const original = await resolveGraphInput(request.original);
  const subgraph = await resolveGraphInput(request.subgraph);

  const outcome = verifyExtraction(
    original.text,
    subgraph.text,
    request.edgeTypes ?? config.extraction.edgeTypes,
    { maxIssuesPerCategory: config.verification.maxIssuesPerCategory },
  );
  return toReportDocument(
    outcome,
    reportFiles(original.source, original.text, subgraph.source, subgraph.text),
  );
}

export async function handleVerifyFilter(args: unknown): Promise<VerifyResponse> {
  const request = parseRequest(VerifyFilterRequestSchema, args);
  const config = loadConfig();
  const preFilter = await resolveGraphInput(request.preFilter);
  const filtered = await resolveGraphInput(request.filtered);

  const outcome = verifyUdfFilter(preFilter.text, filtered.text, {
    cfgEdgeType: config.udf.cfgEdgeType,
    callEdgeType: config.udf.callEdgeType,
    maxIssuesPerCategory: config.verification.maxIssuesPerCategory,
  });
  return toReportDocument(
    outcome,
    reportFiles(preFilter.source, preFilter.text, filtered.source, filtered.text),
  );
}
