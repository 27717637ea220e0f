#!/usr/bin/env node

import { parseArgs } from "util";
import { extractCommand } from "./commands/extract.js";
import { filterCommand } from "./commands/filter.js";
import { verifyExtractionCommand, verifyFilterCommand } from "./commands/verify.js";
import { runCommand } from "./commands/run.js";
import { schemaCommand } from "./commands/schema.js";
import { serveCommand } from "./commands/serve.js";
import { versionCommand } from "./commands/version.js";
import {
  parseExtractOptions,
  parseFilterOptions,
  parseGlobalOptions,
  parseRunOptions,
  parseSchemaOptions,
  parseVerifyExtractionOptions,
  parseVerifyFilterOptions,
} from "./argParsing.js";
import { shutdownTracing } from "../util/logger.js";

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    allowPositionals: true,
    strict: false,
    options: {
      help: { type: "boolean", short: "h" },
      version: { type: "boolean", short: "v" },
      config: { type: "string", short: "c" },
      "log-level": { type: "string" },
      "log-format": { type: "string" },
      "edge-types": { type: "string", short: "e" },
      output: { type: "string", short: "o" },
      "output-dir": { type: "string" },
      report: { type: "string", short: "r" },
      root: { type: "string" },
      out: { type: "string" },
      pattern: { type: "string" },
      concurrency: { type: "string" },
    },
  });

  if (values.help) {
    showHelp();
    process.exit(0);
  }

  const global = parseGlobalOptions(values);

  if (values.version) {
    await versionCommand(global);
    process.exit(0);
  }

  const command = positionals[0];

  if (!command) {
    showHelp();
    process.exit(1);
  }

  const args = positionals.slice(1);

  switch (command) {
    case "extract":
      await extractCommand(parseExtractOptions(args, global, values));
      break;

    case "filter":
      await filterCommand(parseFilterOptions(args, global, values));
      break;

    case "verify-extraction":
      await verifyExtractionCommand(
        parseVerifyExtractionOptions(args, global, values),
      );
      break;

    case "verify-filter":
      await verifyFilterCommand(parseVerifyFilterOptions(args, global, values));
      break;

    case "run":
      await runCommand(parseRunOptions(args, global, values));
      break;

    case "schema":
      await schemaCommand(parseSchemaOptions(args, global, values));
      break;

    case "serve":
      await serveCommand(global);
      return;

    case "version":
      await versionCommand(global);
      break;

    default:
      console.error(`Unknown command: ${command}`);
      console.error("");
      showHelp();
      process.exit(1);
  }

  await shutdownTracing();
}

function showHelp(): void {
  console.log(`
cpg-slice - slice and verify code property graph exports

Usage:
  cpg-slice [global-options] <command> [command-options]

Commands:
  extract <input.dot>                      Keep only edges of the given types
  filter <subgraph.dot>                    Keep user-defined functions and their CFG closure
  verify-extraction <original> <subgraph>  Check an extracted subgraph
  verify-filter <subgraph> <filtered>      Check a UDF-filtered graph
  run <input.dot>                          Extract, verify, filter and verify one graph
  schema                                   Report node types and properties across graphs
  serve                                    Start MCP server on stdio
  version                                  Show version information

Global Options:
  -c, --config PATH      Path to configuration file
  --log-level LEVEL      Log level: debug, info, warn, error (default: info)
  --log-format FORMAT    Log format: json, pretty (default: pretty)
  -h, --help             Show this help message
  -v, --version          Show version

 Extract Options:
   -e, --edge-types LIST  Comma-separated edge types (default: CFG,CALL)
   -o, --output PATH      Write the subgraph here instead of stdout

 Filter Options:
   -o, --output PATH      Write the filtered graph here instead of stdout

 Verify Options:
   -e, --edge-types LIST  Edge types the subgraph was extracted with
   -r, --report PATH      Also write the JSON report document

 Run Options:
   --output-dir DIR       Directory for the four artifacts (required)
   -e, --edge-types LIST  Comma-separated edge types (default: CFG,CALL)

 Schema Options:
   --root DIR             Directory to search (required)
   --out DIR              Directory for the JSON reports (required)
   --pattern GLOB         Files to include (default: **/*_udf_filtered.dot)
   --concurrency N        Parallel file reads (default: 8)

 Examples:
   cpg-slice extract export.dot -o CFG_CALL_original.dot
   cpg-slice run export.dot --output-dir out/
   cpg-slice verify-filter out/CFG_CALL_original.dot out/CFG_CALL_original_udf_filtered.dot
   cpg-slice schema --root out/ --out out/schema_report
`);
}

main().catch((error) => {
  console.error(
    `Error: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
