import { SERVICE_NAME, SERVICE_VERSION } from "../../config/constants.js";
import type { VersionOptions } from "../types.js";

export async function versionCommand(_options: VersionOptions): Promise<void> {
  console.log(`${SERVICE_NAME} version: ${SERVICE_VERSION}`);
  console.log("");
  console.log("Environment:");
  console.log(`  Node.js: ${process.version}`);
  console.log(`  Platform: ${process.platform}`);
  console.log(`  Arch: ${process.arch}`);
}
