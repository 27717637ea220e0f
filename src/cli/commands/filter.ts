import { filterGraphText } from "../../pipeline/stages.js";
import { readGraphFile, writeArtifact } from "../../pipeline/io.js";
import type { FilterOptions } from "../types.js";
import { prepareCommand } from "./setup.js";

export async function filterCommand(options: FilterOptions): Promise<void> {
  const config = prepareCommand(options);

  const text = await readGraphFile(options.input);
  const result = filterGraphText(text, {
    cfg: config.udf.cfgEdgeType,
    call: config.udf.callEdgeType,
  });

  if (options.output) {
    await writeArtifact(options.output, result.text);
    console.error(
      `Wrote ${options.output}: ${result.slice.seeds.size} UDFs, ${result.slice.nodes.size} nodes, ${result.slice.keptEdges.length} edges`,
    );
  } else {
    process.stdout.write(result.text);
  }
}
