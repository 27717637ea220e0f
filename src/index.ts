export { parseGraph, countDiagnostics } from "./dot/graph.js";
export { decodeAttributes, UDF_ATTRIBUTE_KEYS } from "./dot/attributes.js";
export { scanDeclarations, scanAttributeBlock } from "./dot/scanner.js";
export type {
  EdgeRecord,
  Graph,
  GraphDiagnostic,
  NodeId,
  NodeRecord,
  ParsedGraph,
} from "./dot/types.js";
export { edgeSignature, diagnosticToMessage } from "./dot/types.js";

export { extractSubgraph, edgeTypesLabel } from "./slice/extract.js";
export { isUserDefinedFunction, isMethodNode } from "./slice/udf.js";
export { computeCfgClosure } from "./slice/reachability.js";
export { isEdgeRetained, retainEdges, type EdgeTypeNames } from "./slice/retention.js";
export { serializeGraph } from "./slice/serializer.js";
export {
  filterUserDefinedFunctions,
  findUserDefinedFunctions,
  type SliceResult,
} from "./slice/udfFilter.js";

export { verifyExtraction } from "./verify/extraction.js";
export { verifyUdfFilter } from "./verify/udfFilter.js";
export {
  ReportDocumentSchema,
  toReportDocument,
  formatReport,
  type ReportDocument,
  type VerificationReport,
  type VerificationOutcome,
} from "./verify/report.js";

export {
  extractGraphText,
  filterGraphText,
  processGraphText,
} from "./pipeline/stages.js";
export { runPipeline, type PipelineResult } from "./pipeline/runPipeline.js";

export { summarizeGraphSchema, aggregateSchemas } from "./schema/summary.js";
export { writeSchemaReports } from "./schema/writeReports.js";

export { loadConfig } from "./config/loadConfig.js";
export type { CpgSliceConfig } from "./config/types.js";
export {
  ConfigError,
  ValidationError,
  InputUnavailableError,
  OutputWriteError,
  errorToMcpResponse,
} from "./mcp/errors.js";
