/**
 * In-memory stages: text in, text and diagnostics out.
 *
 * @module pipeline/stages
 */

import { UDF_ATTRIBUTE_KEYS } from "../dot/attributes.js";
import { parseGraph } from "../dot/graph.js";
import { type GraphDiagnostic, type ParsedGraph } from "../dot/types.js";
import { edgeTypesLabel, extractSubgraph, type SubgraphExtraction } from "../slice/extract.js";
import { DEFAULT_EDGE_TYPE_NAMES, type EdgeTypeNames } from "../slice/retention.js";
import { serializeGraph, toGraphIdentifier } from "../slice/serializer.js";
import { filterUserDefinedFunctions, type SliceResult } from "../slice/udfFilter.js";
import { verifyExtraction } from "../verify/extraction.js";
import type { VerificationOutcome } from "../verify/report.js";
import { verifyUdfFilter } from "../verify/udfFilter.js";
import { logger } from "../util/logger.js";
import { SPAN_NAMES, setSpanAttributes, withSpanSync } from "../util/tracing.js";

export interface ExtractStageResult {
  text: string;
  extraction: SubgraphExtraction;
  diagnostics: readonly GraphDiagnostic[];
}

export interface FilterStageResult {
  text: string;
  slice: SliceResult;
  diagnostics: readonly GraphDiagnostic[];
}

function parseTraced(text: string, attributeKeys?: ReadonlySet<string>): ParsedGraph {
  return withSpanSync(SPAN_NAMES.PARSE, (span) => {
    const parsed = parseGraph(text, { attributeKeys });
    setSpanAttributes(span, {
      counts: { nodes: parsed.graph.nodes.size, edges: parsed.graph.edges.length },
      diagnostics: parsed.diagnostics.length,
    });
    return parsed;
  });
}

export function logDiagnostics(stage: string, diagnostics: readonly GraphDiagnostic[]): void {
  if (diagnostics.length === 0) return;
  let malformed = 0;
  const dangling: string[] = [];
  for (const d of diagnostics) {
    if (d.kind === "malformed_declaration") {
      malformed++;
      logger.debug(`${stage}: line ${d.line}: ${d.message}`);
    } else {
      dangling.push(d.nodeId);
    }
  }
  logger.warn(`${stage}: input has diagnostics`, {
    malformedDeclarations: malformed,
    danglingReferences: dangling.length,
    danglingSample: dangling.slice(0, 5),
  });
}

export function extractGraphText(
  text: string,
  edgeTypes: readonly string[],
): ExtractStageResult {
  const { graph, diagnostics } = parseTraced(text);
  return withSpanSync(SPAN_NAMES.EXTRACT, (span) => {
    const extraction = extractSubgraph(graph, new Set(edgeTypes));
    setSpanAttributes(span, {
      edgeTypes: edgeTypes.join(","),
      counts: { nodes: extraction.nodes.size, edges: extraction.edges.length },
    });

    const output = serializeGraph({
      name: toGraphIdentifier(`subgraph_${edgeTypesLabel(edgeTypes)}`),
      comments: [
        "Direct extraction from original DOT file",
        `Edge types: ${edgeTypes.join(", ")}`,
      ],
      nodes: extraction.nodes,
      edges: extraction.edges,
    });

    logDiagnostics("extract", diagnostics);
    if (extraction.missingNodeIds.length > 0) {
      logger.warn("extract: edge endpoints without a node declaration", {
        count: extraction.missingNodeIds.length,
      });
    }
    return { text: output, extraction, diagnostics };
  });
}

export function filterGraphText(
  text: string,
  types: EdgeTypeNames = DEFAULT_EDGE_TYPE_NAMES,
): FilterStageResult {
  const { graph, diagnostics } = parseTraced(text, UDF_ATTRIBUTE_KEYS);
  return withSpanSync(SPAN_NAMES.UDF_FILTER, (span) => {
    const slice = filterUserDefinedFunctions(graph, types);
    setSpanAttributes(span, {
      counts: {
        seeds: slice.seeds.size,
        nodes: slice.nodes.size,
        edges: slice.keptEdges.length,
      },
    });

    const output = serializeGraph({
      name: toGraphIdentifier(`udf_${graph.name ?? "filtered"}`),
      comments: [
        "UDF-filtered subgraph",
        "Only user-defined functions and their bodies",
      ],
      nodes: slice.nodes,
      edges: slice.keptEdges,
    });

    logDiagnostics("filter", diagnostics);
    logger.info("filter: user-defined functions", {
      udfs: slice.seeds.size,
      methods: slice.methodCount,
      keptNodes: slice.nodes.size,
      keptEdges: slice.keptEdges.length,
    });
    return { text: output, slice, diagnostics };
  });
}

export interface ProcessOptions {
  edgeTypes: readonly string[];
  udfEdgeTypes?: EdgeTypeNames;
  maxIssuesPerCategory?: number;
}

export interface ProcessResult {
  subgraphText: string;
  filteredText: string;
  extractionReport: VerificationOutcome;
  udfReport: VerificationOutcome;
  diagnostics: readonly GraphDiagnostic[];
}

/** Extract, verify, filter and verify one graph without touching disk. */
export function processGraphText(text: string, options: ProcessOptions): ProcessResult {
  return withSpanSync(SPAN_NAMES.PIPELINE, () => {
    const types = options.udfEdgeTypes ?? DEFAULT_EDGE_TYPE_NAMES;
    const extracted = extractGraphText(text, options.edgeTypes);
    const extractionReport = verifyExtraction(text, extracted.text, options.edgeTypes, {
      maxIssuesPerCategory: options.maxIssuesPerCategory,
    });
    const filtered = filterGraphText(extracted.text, types);
    const udfReport = verifyUdfFilter(extracted.text, filtered.text, {
      cfgEdgeType: types.cfg,
      callEdgeType: types.call,
      maxIssuesPerCategory: options.maxIssuesPerCategory,
    });

    return {
      subgraphText: extracted.text,
      filteredText: filtered.text,
      extractionReport,
      udfReport,
      diagnostics: extracted.diagnostics,
    };
  });
}
