import type {
  CLIOptions,
  ExtractOptions,
  FilterOptions,
  LogFormat,
  LogLevel,
  RunOptions,
  SchemaOptions,
  VerifyExtractionOptions,
  VerifyFilterOptions,
} from "./types.js";
import { MAX_SCHEMA_CONCURRENCY } from "../config/constants.js";

export type ParsedOptionValues = Record<string, unknown>;

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];
const LOG_FORMATS: readonly LogFormat[] = ["json", "pretty"];

function stringValue(values: ParsedOptionValues, key: string): string | undefined {
  const value = values[key];
  return typeof value === "string" ? value : undefined;
}

function requirePositional(args: string[], index: number, name: string): string {
  const value = args[index];
  if (!value) {
    throw new Error(`Missing required argument <${name}>`);
  }
  return value;
}

export function parseEdgeTypes(value: string): string[] {
  const types = value
    .split(",")
    .map((type) => type.trim())
    .filter((type) => type.length > 0);
  if (types.length === 0) {
    throw new Error("--edge-types must name at least one edge type");
  }
  return types;
}

function parseConcurrency(value: string): number {
  const concurrency = parseInt(value, 10);
  if (isNaN(concurrency) || concurrency < 1) {
    throw new Error("--concurrency must be a positive integer");
  }
  if (concurrency > MAX_SCHEMA_CONCURRENCY) {
    throw new Error(`--concurrency must be at most ${MAX_SCHEMA_CONCURRENCY}`);
  }
  return concurrency;
}

export function parseGlobalOptions(values: ParsedOptionValues): CLIOptions {
  const global: CLIOptions = { config: stringValue(values, "config") };

  const level = stringValue(values, "log-level");
  if (level !== undefined) {
    const match = LOG_LEVELS.find((l) => l === level);
    if (!match) {
      throw new Error(`--log-level must be one of ${LOG_LEVELS.join(", ")}`);
    }
    global.logLevel = match;
  }

  const format = stringValue(values, "log-format");
  if (format !== undefined) {
    const match = LOG_FORMATS.find((f) => f === format);
    if (!match) {
      throw new Error(`--log-format must be one of ${LOG_FORMATS.join(", ")}`);
    }
    global.logFormat = match;
  }

  return global;
}

export function parseExtractOptions(
  args: string[],
  global: CLIOptions,
  values: ParsedOptionValues,
): ExtractOptions {
  const options: ExtractOptions = {
    ...global,
    input: requirePositional(args, 0, "input.dot"),
  };
  const edgeTypes = stringValue(values, "edge-types");
  if (edgeTypes !== undefined) {
    options.edgeTypes = parseEdgeTypes(edgeTypes);
  }
  options.output = stringValue(values, "output");
  return options;
}

export function parseFilterOptions(
  args: string[],
  global: CLIOptions,
  values: ParsedOptionValues,
): FilterOptions {
  return {
    ...global,
    input: requirePositional(args, 0, "subgraph.dot"),
    output: stringValue(values, "output"),
  };
}

export function parseVerifyExtractionOptions(
  args: string[],
  global: CLIOptions,
  values: ParsedOptionValues,
): VerifyExtractionOptions {
  const options: VerifyExtractionOptions = {
    ...global,
    original: requirePositional(args, 0, "original.dot"),
    subgraph: requirePositional(args, 1, "subgraph.dot"),
    report: stringValue(values, "report"),
  };
  const edgeTypes = stringValue(values, "edge-types");
  if (edgeTypes !== undefined) {
    options.edgeTypes = parseEdgeTypes(edgeTypes);
  }
  return options;
}

export function parseVerifyFilterOptions(
  args: string[],
  global: CLIOptions,
  values: ParsedOptionValues,
): VerifyFilterOptions {
  return {
    ...global,
    preFilter: requirePositional(args, 0, "subgraph.dot"),
    filtered: requirePositional(args, 1, "filtered.dot"),
    report: stringValue(values, "report"),
  };
}

export function parseRunOptions(
  args: string[],
  global: CLIOptions,
  values: ParsedOptionValues,
): RunOptions {
  const outputDir = stringValue(values, "output-dir");
  if (!outputDir) {
    throw new Error("run requires --output-dir");
  }
  const options: RunOptions = {
    ...global,
    input: requirePositional(args, 0, "input.dot"),
    outputDir,
  };
  const edgeTypes = stringValue(values, "edge-types");
  if (edgeTypes !== undefined) {
    options.edgeTypes = parseEdgeTypes(edgeTypes);
  }
  return options;
}

export function parseSchemaOptions(
  args: string[],
  global: CLIOptions,
  values: ParsedOptionValues,
): SchemaOptions {
  const root = stringValue(values, "root") ?? args[0];
  const out = stringValue(values, "out");
  if (!root) {
    throw new Error("schema requires --root");
  }
  if (!out) {
    throw new Error("schema requires --out");
  }
  const options: SchemaOptions = {
    ...global,
    root,
    out,
    pattern: stringValue(values, "pattern"),
  };
  const concurrency = stringValue(values, "concurrency");
  if (concurrency !== undefined) {
    options.concurrency = parseConcurrency(concurrency);
  }
  return options;
}
