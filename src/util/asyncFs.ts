/**
 * Async file system operations with concurrency control.
 *
 * Wraps Node.js fs operations with async/await and applies
 * concurrency limits to prevent resource exhaustion.
 */

import { readFile } from "fs/promises";
import { ConcurrencyLimiter } from "./concurrency.js";

export interface AsyncFsConfig {
  /**
   * Maximum concurrent file read operations.
   */
  maxConcurrentReads?: number;
}

export class AsyncFsOperations {
  private readLimiter: ConcurrencyLimiter;

  constructor(config: AsyncFsConfig = {}) {
    const { maxConcurrentReads = 10 } = config;

    this.readLimiter = new ConcurrencyLimiter({
      maxConcurrency: maxConcurrentReads,
    });
  }

  /**
   * Reads a file's content asynchronously with concurrency control.
   */
  async readFile(
    filePath: string,
    encoding: BufferEncoding = "utf-8",
  ): Promise<string> {
    return this.readLimiter.run(() => readFile(filePath, encoding));
  }
}

export function createAsyncFsOperations(
  config?: AsyncFsConfig,
): AsyncFsOperations {
  return new AsyncFsOperations(config);
}
