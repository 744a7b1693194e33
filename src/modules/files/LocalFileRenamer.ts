/**
 * Local file renaming within a file's own folder
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { RenameOutcome } from '../../types';
import { AppLogger } from '../../utils/logger';
import { getErrorMessage, isNodeError } from '../../utils/errorUtils';

export interface LocalFileRenamerOptions {
  /** Check for collisions and report the planned name without renaming */
  dryRun?: boolean;
}

export class LocalFileRenamer {
  private dryRun: boolean;
  // Destinations already handed out in dry-run mode, nothing exists on disk for them yet
  private plannedDestinations = new Set<string>();

  constructor(options: LocalFileRenamerOptions = {}) {
    this.dryRun = options.dryRun ?? false;
  }

  /**
   * Rename a file in place, never replacing an existing file
   */
  async rename(sourcePath: string, newName: string): Promise<RenameOutcome> {
    const destinationPath = path.join(path.dirname(sourcePath), newName);
    const originalName = path.basename(sourcePath);

    try {
      if (this.plannedDestinations.has(destinationPath) || (await this.fileExists(destinationPath))) {
        AppLogger.warn(`Target file already exists, skipping ${originalName}: ${newName}`);
        return { kind: 'skipped-exists', destinationPath };
      }

      if (this.dryRun) {
        this.plannedDestinations.add(destinationPath);
        AppLogger.info(`[dry-run] ${originalName} => ${newName}`);
        return { kind: 'planned', destinationPath };
      }

      await fs.rename(sourcePath, destinationPath);
      AppLogger.info(`Renamed ${originalName} to ${newName}`);
      return { kind: 'renamed', destinationPath };
    } catch (error) {
      const message = getErrorMessage(error);
      AppLogger.error(`Failed to rename ${originalName}: ${message}`);
      return { kind: 'failed', destinationPath, message };
    }
  }

  /**
   * Check if anything (file, folder, dangling link) occupies the path
   */
  private async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.lstat(filePath);
      return true;
    } catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }
}
