import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { InputUnavailableError, OutputWriteError } from "../mcp/errors.js";

export async function readGraphFile(path: string): Promise<string> {
  try {
    return await readFile(path, "utf-8");
  } catch (err) {
    throw new InputUnavailableError(path, err);
  }
}

export async function writeArtifact(path: string, content: string): Promise<void> {
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, "utf-8");
  } catch (err) {
    throw new OutputWriteError(path, err);
  }
}

export async function writeJsonArtifact(path: string, value: unknown): Promise<void> {
  await writeArtifact(path, JSON.stringify(value, null, 2) + "\n");
}
