/**
 * Constants for cpg-slice
 *
 * Named values shared across the parser, slicer, verifier and CLI.
 */

// ============================================================================
// Graph Format Constants
// ============================================================================

/**
 * Edge label of control-flow edges in the CPG export.
 */
export const DEFAULT_CFG_EDGE_TYPE = "CFG";

/**
 * Edge label of call edges in the CPG export.
 */
export const DEFAULT_CALL_EDGE_TYPE = "CALL";

/**
 * Edge types kept by subgraph extraction unless configured otherwise.
 */
export const DEFAULT_EXTRACTION_EDGE_TYPES = [
  DEFAULT_CFG_EDGE_TYPE,
  DEFAULT_CALL_EDGE_TYPE,
] as const;

// ============================================================================
// Verification Constants
// ============================================================================

/**
 * Issues listed per verification category before the rest are summarized
 * as a single "... and N more" entry.
 */
export const DEFAULT_MAX_ISSUES_PER_CATEGORY = 100;

/**
 * Characters of context shown on each side of the first differing offset
 * when a node's raw text does not match.
 */
export const INTEGRITY_DIFF_CONTEXT_CHARS = 20;

// ============================================================================
// Schema Report Constants
// ============================================================================

/**
 * Glob used to find filtered graphs for the schema report.
 */
export const DEFAULT_SCHEMA_PATTERN = "**/*_udf_filtered.dot";

/**
 * Maximum files read concurrently while building a schema report.
 */
export const DEFAULT_SCHEMA_CONCURRENCY = 8;

export const MAX_SCHEMA_CONCURRENCY = 64;

// ============================================================================
// Artifact Naming
// ============================================================================

export const CONFIG_FILE_NAME = "cpgslice.config.json";

export const SUBGRAPH_SUFFIX = "_original.dot";

export const UDF_FILTERED_SUFFIX = "_original_udf_filtered.dot";

export const EXTRACTION_REPORT_SUFFIX = "_extraction_report.json";

export const UDF_REPORT_SUFFIX = "_udf_verification_report.json";

// ============================================================================
// Service Identity
// ============================================================================

export const SERVICE_NAME = "cpg-slice";

export const SERVICE_VERSION = "0.3.0";
