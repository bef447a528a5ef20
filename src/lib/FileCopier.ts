/**
 * File copier implementation
 * Copies bytes, then carries over timestamps and mode like `cp -p`
 */

import * as fs from "fs";
import { IFileCopier } from "../interfaces/IFileCopier";
import { ILogger } from "../interfaces/ILogger";
import { errorMessage } from "../types";

export class FileCopier implements IFileCopier {
  constructor(private readonly logger?: ILogger) {}

  async copy(source: string, destination: string): Promise<void> {
    try {
      await fs.promises.copyFile(source, destination);

      const stats = await fs.promises.stat(source);
      await fs.promises.utimes(destination, stats.atime, stats.mtime);
      await fs.promises.chmod(destination, stats.mode);
    } catch (error) {
      await this.removePartial(destination);
      throw error;
    }
  }

  private async removePartial(destination: string): Promise<void> {
    try {
      await fs.promises.rm(destination, { force: true });
    } catch (cleanupError) {
      this.logger?.debug(
        `Could not remove partial copy ${destination}: ${errorMessage(cleanupError)}`
      );
    }
  }
}
