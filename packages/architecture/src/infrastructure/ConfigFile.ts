import { readFile } from "node:fs/promises";
import path from "node:path";
import { ConfigurationError, Err, Ok, type Result } from "@archlens/core";

export const CONFIG_FILE_NAME = "archlens.config.json";

/**
 * Read `archlens.config.json` from the project root. A missing file is an
 * empty configuration; validation is left to `loadConfig`.
 */
export async function readConfigFile(rootPath: string): Promise<Result<unknown, ConfigurationError>> {
  const filePath = path.join(rootPath, CONFIG_FILE_NAME);
  let text: string;
  try {
    text = await readFile(filePath, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return Ok({});
    const reason = error instanceof Error ? error.message : String(error);
    return Err(new ConfigurationError(`Cannot read ${CONFIG_FILE_NAME}`, [reason]));
  }

  try {
    const parsed: unknown = JSON.parse(text);
    return Ok(parsed);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return Err(new ConfigurationError(`Invalid JSON in ${CONFIG_FILE_NAME}`, [reason]));
  }
}
