export enum ErrorCode {
  CONFIG_ERROR = "CONFIG_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  INPUT_UNAVAILABLE = "INPUT_UNAVAILABLE",
  OUTPUT_WRITE_FAILED = "OUTPUT_WRITE_FAILED",
}

export class ConfigError extends Error {
  readonly code = ErrorCode.CONFIG_ERROR;
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ValidationError extends Error {
  readonly code = ErrorCode.VALIDATION_ERROR;
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * The text of a graph could not be obtained. Fatal for that graph only.
 */
export class InputUnavailableError extends Error {
  readonly code = ErrorCode.INPUT_UNAVAILABLE;
  readonly path: string;
  constructor(path: string, cause?: unknown) {
    super(
      `Input unavailable: ${path}${cause instanceof Error ? ` (${cause.message})` : ""}`,
      { cause },
    );
    this.name = "InputUnavailableError";
    this.path = path;
  }
}

export class OutputWriteError extends Error {
  readonly code = ErrorCode.OUTPUT_WRITE_FAILED;
  readonly path: string;
  constructor(path: string, cause?: unknown) {
    super(
      `Failed to write ${path}${cause instanceof Error ? ` (${cause.message})` : ""}`,
      { cause },
    );
    this.name = "OutputWriteError";
    this.path = path;
  }
}

export interface McpErrorDetail {
  message: string;
  code?: string;
}

function readCode(error: Error): string | undefined {
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function errorToMcpResponse(error: unknown): { error: McpErrorDetail } {
  if (error instanceof Error) {
    const detail: McpErrorDetail = {
      message: error.message,
    };

    const code = readCode(error);
    if (code) {
      detail.code = code;
    }

    return { error: detail };
  }
  return {
    error: {
      message: String(error),
    },
  };
}
