import { writeSchemaReports } from "../../schema/writeReports.js";
import type { SchemaOptions } from "../types.js";
import { prepareCommand } from "./setup.js";

export async function schemaCommand(options: SchemaOptions): Promise<void> {
  const config = prepareCommand(options);

  const result = await writeSchemaReports({
    root: options.root,
    pattern: options.pattern ?? config.schema.pattern,
    outDir: options.out,
    concurrency: options.concurrency ?? config.schema.concurrency,
  });

  console.log(`Scanned ${result.files.length} file(s)`);
  for (const path of result.written) {
    console.log(`  ${path}`);
  }
}
