import type { FileAccessError, Result } from "@archlens/core";

/**
 * Port for the file reads the engine performs. The engine never writes.
 */
export interface FileSystem {
  /**
   * Read file contents as UTF-8.
   */
  read(filePath: string): Promise<Result<string, FileAccessError>>;

  exists(filePath: string): Promise<boolean>;
}
