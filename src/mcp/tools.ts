import { z } from "zod";
import { ReportDocumentSchema } from "../verify/report.js";

// ============================================================================
// Shared Schemas
// ============================================================================

/** A graph given inline or by path; exactly one of the two. */
export const GraphInputSchema = z
  .object({
    text: z.string().optional(),
    path: z.string().min(1).optional(),
  })
  .refine((input) => (input.text === undefined) !== (input.path === undefined), {
    message: "Provide exactly one of text or path",
  });

export type GraphInput = z.infer<typeof GraphInputSchema>;

const EdgeTypesSchema = z.array(z.string().min(1)).min(1);

export const GraphCountsSchema = z.object({
  nodes: z.number().int().min(0),
  edges: z.number().int().min(0),
});

// ============================================================================
// Extraction Schemas
// ============================================================================

export const ExtractRequestSchema = z.object({
  graph: GraphInputSchema,
  edgeTypes: EdgeTypesSchema.optional(),
});

export const ExtractResponseSchema = z.object({
  text: z.string(),
  counts: GraphCountsSchema,
  missingNodeIds: z.array(z.string()),
  diagnostics: z.array(z.string()),
});

// ============================================================================
// UDF Filter Schemas
// ============================================================================

export const FilterRequestSchema = z.object({
  graph: GraphInputSchema,
  cfgEdgeType: z.string().min(1).optional(),
  callEdgeType: z.string().min(1).optional(),
});

export const FilterResponseSchema = z.object({
  text: z.string(),
  seeds: z.array(z.string()),
  methodCount: z.number().int().min(0),
  counts: GraphCountsSchema,
  diagnostics: z.array(z.string()),
});

// ============================================================================
// Verification Schemas
// ============================================================================

export const VerifyExtractionRequestSchema = z.object({
  original: GraphInputSchema,
  subgraph: GraphInputSchema,
  edgeTypes: EdgeTypesSchema.optional(),
});

export const VerifyFilterRequestSchema = z.object({
  preFilter: GraphInputSchema,
  filtered: GraphInputSchema,
});

export const VerifyResponseSchema = ReportDocumentSchema;

// ============================================================================
// Pipeline Schemas
// ============================================================================

export const RunRequestSchema = z.object({
  inputPath: z.string().min(1),
  outputDir: z.string().min(1),
  edgeTypes: EdgeTypesSchema.optional(),
});

export const RunResponseSchema = z.object({
  artifacts: z.object({
    subgraph: z.string(),
    extractionReport: z.string(),
    filtered: z.string(),
    udfReport: z.string(),
  }),
  extraction: ReportDocumentSchema,
  udf: ReportDocumentSchema,
  overallPassed: z.boolean(),
});

export type ExtractRequest = z.infer<typeof ExtractRequestSchema>;
export type ExtractResponse = z.infer<typeof ExtractResponseSchema>;
export type FilterRequest = z.infer<typeof FilterRequestSchema>;
export type FilterResponse = z.infer<typeof FilterResponseSchema>;
export type VerifyExtractionRequest = z.infer<typeof VerifyExtractionRequestSchema>;
export type VerifyFilterRequest = z.infer<typeof VerifyFilterRequestSchema>;
export type VerifyResponse = z.infer<typeof VerifyResponseSchema>;
export type RunRequest = z.infer<typeof RunRequestSchema>;
export type RunResponse = z.infer<typeof RunResponseSchema>;
