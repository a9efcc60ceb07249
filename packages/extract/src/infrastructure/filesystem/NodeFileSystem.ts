import { access, readFile } from "node:fs/promises";
import path from "node:path";
import { Err, FileAccessError, Ok, type Result } from "@archlens/core";
import type { FileSystem } from "../../core/ports/FileSystem.js";

/**
 * Node.js implementation of the FileSystem port.
 */
export class NodeFileSystem implements FileSystem {
  private readonly basePath: string;

  constructor(basePath?: string) {
    this.basePath = basePath ?? process.cwd();
  }

  private resolvePath(filePath: string): string {
    return path.isAbsolute(filePath) ? filePath : path.resolve(this.basePath, filePath);
  }

  async read(filePath: string): Promise<Result<string, FileAccessError>> {
    try {
      return Ok(await readFile(this.resolvePath(filePath), "utf-8"));
    } catch (error) {
      return Err(new FileAccessError(filePath, error));
    }
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await access(this.resolvePath(filePath));
      return true;
    } catch {
      return false;
    }
  }
}
