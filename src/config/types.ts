import { z } from "zod";
import {
  DEFAULT_CALL_EDGE_TYPE,
  DEFAULT_CFG_EDGE_TYPE,
  DEFAULT_EXTRACTION_EDGE_TYPES,
  DEFAULT_MAX_ISSUES_PER_CATEGORY,
  DEFAULT_SCHEMA_CONCURRENCY,
  DEFAULT_SCHEMA_PATTERN,
  MAX_SCHEMA_CONCURRENCY,
} from "./constants.js";

export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);
export const LogFormatSchema = z.enum(["json", "pretty"]);

export const ExtractionConfigSchema = z.object({
  edgeTypes: z
    .array(z.string().min(1))
    .min(1)
    .default([...DEFAULT_EXTRACTION_EDGE_TYPES]),
});

export type ExtractionConfig = z.infer<typeof ExtractionConfigSchema>;

export const UdfConfigSchema = z.object({
  cfgEdgeType: z.string().min(1).default(DEFAULT_CFG_EDGE_TYPE),
  callEdgeType: z.string().min(1).default(DEFAULT_CALL_EDGE_TYPE),
});

export type UdfConfig = z.infer<typeof UdfConfigSchema>;

export const VerificationConfigSchema = z.object({
  maxIssuesPerCategory: z
    .number()
    .int()
    .min(1)
    .default(DEFAULT_MAX_ISSUES_PER_CATEGORY),
});

export type VerificationConfig = z.infer<typeof VerificationConfigSchema>;

export const SchemaConfigSchema = z.object({
  pattern: z.string().min(1).default(DEFAULT_SCHEMA_PATTERN),
  concurrency: z
    .number()
    .int()
    .min(1)
    .max(MAX_SCHEMA_CONCURRENCY)
    .default(DEFAULT_SCHEMA_CONCURRENCY),
});

export type SchemaConfig = z.infer<typeof SchemaConfigSchema>;

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default("info"),
  format: LogFormatSchema.default("pretty"),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const TracingConfigSchema = z.object({
  enabled: z.boolean().default(false),
  exporterType: z.enum(["console", "memory"]).default("console"),
  serviceName: z.string().min(1).optional(),
});

export type TracingConfig = z.infer<typeof TracingConfigSchema>;

export const CpgSliceConfigSchema = z.object({
  extraction: ExtractionConfigSchema.default({}),
  udf: UdfConfigSchema.default({}),
  verification: VerificationConfigSchema.default({}),
  schema: SchemaConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  tracing: TracingConfigSchema.default({}),
});

export type CpgSliceConfig = z.infer<typeof CpgSliceConfigSchema>;
