import type { z } from "zod";
import { ValidationError } from "../errors.js";
import type { GraphInput } from "../tools.js";
import { readGraphFile } from "../../pipeline/io.js";

export const INLINE_SOURCE = "<inline>";

export function parseRequest<T extends z.ZodTypeAny>(schema: T, args: unknown): z.output<T> {
  const result = schema.safeParse(args);
  if (!result.success) {
    const details = result.error.errors
      .map((e) => `${e.path.join(".") || "(root)"}: ${e.message}`)
      .join("; ");
    throw new ValidationError(`Invalid arguments: ${details}`);
  }
  return result.data;
}

export interface ResolvedGraph {
  text: string;
  /** Path the text came from, or `<inline>`. */
  source: string;
}

export async function resolveGraphInput(input: GraphInput): Promise<ResolvedGraph> {
  if (input.text !== undefined) {
    return { text: input.text, source: INLINE_SOURCE };
  }
  if (input.path !== undefined) {
    return { text: await readGraphFile(input.path), source: input.path };
  }
  throw new ValidationError("Provide exactly one of text or path");
}
