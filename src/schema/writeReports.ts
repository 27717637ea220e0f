import fg from "fast-glob";
import { join, resolve } from "path";
import { DEFAULT_SCHEMA_CONCURRENCY } from "../config/constants.js";
import { parseGraph } from "../dot/graph.js";
import { InputUnavailableError } from "../mcp/errors.js";
import { writeJsonArtifact } from "../pipeline/io.js";
import { createAsyncFsOperations } from "../util/asyncFs.js";
import { logger } from "../util/logger.js";
import { SPAN_NAMES, setSpanAttributes, withSpan } from "../util/tracing.js";
import { aggregateSchemas, type GraphSchemaSummary, summarizeGraphSchema } from "./summary.js";

export interface SchemaReportOptions {
  root: string;
  pattern: string;
  outDir: string;
  concurrency?: number;
  /** Timestamp written into every report. */
  now?: Date;
}

export interface SchemaReportResult {
  files: string[];
  written: string[];
}

export async function writeSchemaReports(
  options: SchemaReportOptions,
): Promise<SchemaReportResult> {
  return withSpan(SPAN_NAMES.SCHEMA, async (span) => {
    const result = await scanAndWrite(options);
    setSpanAttributes(span, { files: result.files.length, pattern: options.pattern });
    return result;
  });
}

async function scanAndWrite(options: SchemaReportOptions): Promise<SchemaReportResult> {
  const root = resolve(options.root);
  const matches = await fg(options.pattern, {
    cwd: root,
    onlyFiles: true,
    dot: false,
  });
  matches.sort();

  if (matches.length === 0) {
    throw new InputUnavailableError(
      root,
      new Error(`no files matched pattern "${options.pattern}"`),
    );
  }

  const fs = createAsyncFsOperations({
    maxConcurrentReads: options.concurrency ?? DEFAULT_SCHEMA_CONCURRENCY,
  });

  const summaries = await Promise.all(
    matches.map(async (rel): Promise<[string, GraphSchemaSummary]> => {
      const path = join(root, rel);
      let text: string;
      try {
        text = await fs.readFile(path);
      } catch (err) {
        throw new InputUnavailableError(path, err);
      }
      return [rel, summarizeGraphSchema(parseGraph(text).graph)];
    }),
  );

  const aggregate = aggregateSchemas(new Map(summaries));
  const header = {
    generated_at_utc: (options.now ?? new Date()).toISOString(),
    root,
    pattern: options.pattern,
  };

  const outputs: [string, Record<string, unknown>][] = [
    ["node_types.json", { ...header, ...aggregate.nodeTypes }],
    ["properties_by_type.json", { ...header, types: aggregate.propertiesByType }],
    ["properties_cross_types.json", { ...header, ...aggregate.crossTypes }],
    [
      "properties_global.json",
      { ...header, global_property_union: aggregate.globalPropertyUnion },
    ],
  ];

  const written: string[] = [];
  for (const [name, body] of outputs) {
    const path = join(options.outDir, name);
    await writeJsonArtifact(path, body);
    written.push(path);
  }

  logger.info("Schema reports written", {
    files: matches.length,
    types: Object.keys(aggregate.propertiesByType).length,
    outDir: options.outDir,
  });

  return { files: matches, written };
}
