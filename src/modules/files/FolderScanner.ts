/**
 * Target folder validation and document discovery
 */

import type { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';
import { FileTask } from '../../types';
import { AppLogger } from '../../utils/logger';
import { getErrorMessage, isNodeError } from '../../utils/errorUtils';

export type FolderInvalidReason = 'missing' | 'not-a-directory' | 'unreadable';

export type FolderScanResult =
  | { ok: true; tasks: FileTask[] }
  | { ok: false; reason: FolderInvalidReason; message: string };

export class FolderScanner {
  private folderPath: string;
  private extension: string;

  /**
   * @param extension - lower-case extension with leading dot, e.g. ".pdf"
   */
  constructor(folderPath: string, extension: string) {
    this.folderPath = path.resolve(folderPath);
    this.extension = extension.toLowerCase();
  }

  getFolderPath(): string {
    return this.folderPath;
  }

  /**
   * Validate the folder and list matching files directly inside it
   * The list is sorted by name and taken once, before anything is renamed
   */
  async scan(): Promise<FolderScanResult> {
    const invalid = await this.validateFolder();
    if (invalid) {
      AppLogger.error(invalid.message);
      return invalid;
    }

    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.folderPath, { withFileTypes: true });
    } catch (error) {
      const message = `Cannot read folder ${this.folderPath}: ${getErrorMessage(error)}`;
      AppLogger.error(message);
      return { ok: false, reason: 'unreadable', message };
    }

    const tasks = entries
      .filter((entry) => entry.isFile() && this.matchesExtension(entry.name))
      .map((entry) => entry.name)
      .sort()
      .map((fileName): FileTask => ({
        sourcePath: path.join(this.folderPath, fileName),
        fileName,
        originalExtension: path.extname(fileName),
      }));

    AppLogger.info(`Found ${tasks.length} ${this.extension} files in ${this.folderPath}`);
    return { ok: true, tasks };
  }

  private async validateFolder(): Promise<Extract<FolderScanResult, { ok: false }> | null> {
    try {
      const stats = await fs.stat(this.folderPath);
      if (!stats.isDirectory()) {
        return {
          ok: false,
          reason: 'not-a-directory',
          message: `Path is not a directory: ${this.folderPath}`,
        };
      }
      return null;
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return { ok: false, reason: 'missing', message: `Folder does not exist: ${this.folderPath}` };
      }
      return {
        ok: false,
        reason: 'unreadable',
        message: `Cannot access folder ${this.folderPath}: ${getErrorMessage(error)}`,
      };
    }
  }

  private matchesExtension(fileName: string): boolean {
    return path.extname(fileName).toLowerCase() === this.extension;
  }
}
