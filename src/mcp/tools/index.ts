import type { MCPServer } from "../../server.js";
import {
  ExtractRequestSchema,
  FilterRequestSchema,
  RunRequestSchema,
  VerifyExtractionRequestSchema,
  VerifyFilterRequestSchema,
} from "../tools.js";
import { handleExtract, handleFilter } from "./graph.js";
import { handleVerifyExtraction, handleVerifyFilter } from "./verify.js";
import { handleRun } from "./run.js";

export function registerTools(server: MCPServer): void {
  server.registerTool(
    "cpg.extract",
    "Extract the subgraph made of the given edge types",
    ExtractRequestSchema,
    handleExtract,
  );

  server.registerTool(
    "cpg.filter",
    "Keep user-defined functions, their CFG closure and the edges between them",
    FilterRequestSchema,
    handleFilter,
  );

  server.registerTool(
    "cpg.verify.extraction",
    "Check an extracted subgraph against its original graph",
    VerifyExtractionRequestSchema,
    handleVerifyExtraction,
  );

  server.registerTool(
    "cpg.verify.filter",
    "Check a UDF-filtered graph against the graph it was filtered from",
    VerifyFilterRequestSchema,
    handleVerifyFilter,
  );

  server.registerTool(
    "cpg.run",
    "Extract, filter and verify one graph file, writing every artifact",
    RunRequestSchema,
    handleRun,
  );
}
