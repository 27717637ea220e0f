export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "json" | "pretty";

export interface CLIOptions {
  config?: string;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
}

export interface ExtractOptions extends CLIOptions {
  input: string;
  edgeTypes?: string[];
  output?: string;
}

export interface FilterOptions extends CLIOptions {
  input: string;
  output?: string;
}

export interface VerifyExtractionOptions extends CLIOptions {
  original: string;
  subgraph: string;
  edgeTypes?: string[];
  report?: string;
}

export interface VerifyFilterOptions extends CLIOptions {
  preFilter: string;
  filtered: string;
  report?: string;
}

export interface RunOptions extends CLIOptions {
  input: string;
  outputDir: string;
  edgeTypes?: string[];
}

export interface SchemaOptions extends CLIOptions {
  root: string;
  out: string;
  pattern?: string;
  concurrency?: number;
}

export interface ServeOptions extends CLIOptions {}

export interface VersionOptions extends CLIOptions {}
