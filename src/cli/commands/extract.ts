import { extractGraphText } from "../../pipeline/stages.js";
import { readGraphFile, writeArtifact } from "../../pipeline/io.js";
import type { ExtractOptions } from "../types.js";
import { prepareCommand } from "./setup.js";

export async function extractCommand(options: ExtractOptions): Promise<void> {
  const config = prepareCommand(options);
  const edgeTypes = options.edgeTypes ?? config.extraction.edgeTypes;

  const text = await readGraphFile(options.input);
  const result = extractGraphText(text, edgeTypes);

  if (options.output) {
    await writeArtifact(options.output, result.text);
    console.error(
      `Wrote ${options.output}: ${result.extraction.nodes.size} nodes, ${result.extraction.edges.length} edges`,
    );
  } else {
    process.stdout.write(result.text);
  }
}
