import {
  ExtractRequestSchema,
  type ExtractResponse,
  FilterRequestSchema,
  type FilterResponse,
} from "../tools.js";
import { loadConfig } from "../../config/loadConfig.js";
import { compareIds, diagnosticToMessage } from "../../dot/types.js";
import { extractGraphText, filterGraphText } from "../../pipeline/stages.js";
import { parseRequest, resolveGraphInput } from "./input.js";

/**
 * Handles edge-type extraction requests.
 * Edge types default to `extraction.edgeTypes` from the config.
 */
export async function handleExtract(args: unknown): Promise<ExtractResponse> {
  const request = parseRequest(ExtractRequestSchema, args);
  const edgeTypes = request.edgeTypes ?? loadConfig().extraction.edgeTypes;
  const { text } = await resolveGraphInput(request.graph);

  const result = extractGraphText(text, edgeTypes);
  return {
    text: result.text,
    counts: {
      nodes: result.extraction.nodes.size,
      edges: result.extraction.edges.length,
    },
    missingNodeIds: [...result.extraction.missingNodeIds],
    diagnostics: result.diagnostics.map(diagnosticToMessage),
  };
}

/**
 * Handles UDF filter requests over an already extracted subgraph.
 */
export async function handleFilter(args: unknown): Promise<FilterResponse> {
  const request = parseRequest(FilterRequestSchema, args);
  const { udf } = loadConfig();
  const { text } = await resolveGraphInput(request.graph);

  const result = filterGraphText(text, {
    cfg: request.cfgEdgeType ?? udf.cfgEdgeType,
    call: request.callEdgeType ?? udf.callEdgeType,
  });
  return {
    text: result.text,
    seeds: [...result.slice.seeds].sort(compareIds),
    methodCount: result.slice.methodCount,
    counts: {
      nodes: result.slice.nodes.size,
      edges: result.slice.keptEdges.length,
    },
    diagnostics: result.diagnostics.map(diagnosticToMessage),
  };
}
