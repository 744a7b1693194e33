/**
 * Process invoice documents in a local folder
 * Extracts issuer, category and issue date with Gemini and renames each file in place
 */

import * as fs from 'fs/promises';
import { getMimeType } from '../../config';
import { FolderScanner } from '../files/FolderScanner';
import { LocalFileRenamer } from '../files/LocalFileRenamer';
import { FileNamingService } from '../naming/FileNamingService';
import { BatchResult, FileOutcome, FileTask, InvoiceExtractor } from '../../types';
import { AppLogger } from '../../utils/logger';
import { getErrorMessage, toError } from '../../utils/errorUtils';

export interface InvoiceBatchProcessorOptions {
  folderPath: string;
  /** Lower-case extension with leading dot, e.g. ".pdf" */
  extension: string;
  /** Checked before each file and after the last; once aborted no further file is started */
  signal?: AbortSignal;
}

export interface InvoiceBatchProcessorDependencies {
  extractor: InvoiceExtractor;
  namingService?: FileNamingService;
  renamer?: LocalFileRenamer;
  scanner?: FolderScanner;
}

export class InvoiceBatchProcessor {
  private extractor: InvoiceExtractor;
  private namingService: FileNamingService;
  private renamer: LocalFileRenamer;
  private scanner: FolderScanner;
  private signal: AbortSignal | undefined;

  constructor(dependencies: InvoiceBatchProcessorDependencies, options: InvoiceBatchProcessorOptions) {
    this.extractor = dependencies.extractor;
    this.namingService = dependencies.namingService ?? new FileNamingService();
    this.renamer = dependencies.renamer ?? new LocalFileRenamer();
    this.scanner = dependencies.scanner ?? new FolderScanner(options.folderPath, options.extension);
    this.signal = options.signal;
  }

  /**
   * Process all matching files in the folder, one at a time
   */
  async processFolder(): Promise<BatchResult> {
    const scan = await this.scanner.scan();
    if (!scan.ok) {
      return { status: 'folder-invalid', succeeded: 0, total: 0, outcomes: [] };
    }

    if (scan.tasks.length === 0) {
      AppLogger.warn('No files found to process');
      return { status: 'no-files', succeeded: 0, total: 0, outcomes: [] };
    }

    const result: BatchResult = {
      status: 'completed',
      succeeded: 0,
      total: scan.tasks.length,
      outcomes: [],
    };

    for (const task of scan.tasks) {
      if (this.signal?.aborted) {
        const remaining = result.total - result.outcomes.length;
        AppLogger.warn(`Processing interrupted by user, ${remaining} file(s) left untouched`);
        result.status = 'cancelled';
        break;
      }

      const outcome = await this.processFileSafely(task);
      result.outcomes.push(outcome);

      if (outcome.status === 'renamed') {
        result.succeeded++;
      }
    }

    // An interrupt during the last file never reaches the check at the top of the loop
    if (result.status === 'completed' && this.signal?.aborted) {
      AppLogger.warn('Processing interrupted by user after the last file');
      result.status = 'cancelled';
    }

    return result;
  }

  /**
   * Turn anything thrown while handling one file into an outcome for that file
   */
  private async processFileSafely(task: FileTask): Promise<FileOutcome> {
    try {
      return await this.processFile(task);
    } catch (error) {
      AppLogger.error(`Unexpected error processing ${task.fileName}`, toError(error));
      return { status: 'error', task, message: getErrorMessage(error) };
    }
  }

  /**
   * Process a single file: extract, name, rename
   */
  private async processFile(task: FileTask): Promise<FileOutcome> {
    AppLogger.info(`Processing ${task.fileName}`);

    const fileBytes = await fs.readFile(task.sourcePath);
    const extraction = await this.extractor.extract(fileBytes, getMimeType(task.originalExtension));

    if (!extraction.ok) {
      const { failure } = extraction;
      const status = failure.status !== undefined ? ` [${failure.status}]` : '';
      AppLogger.error(
        `Extraction failed for ${task.fileName} (${failure.kind}${status}): ${failure.message}`
      );
      return { status: 'extract-failed', task, failure };
    }

    const newName = this.namingService.generate(extraction.record, task.originalExtension);
    const renamed = await this.renamer.rename(task.sourcePath, newName);

    switch (renamed.kind) {
      case 'renamed':
      case 'planned':
        return { status: 'renamed', task, newName, dryRun: renamed.kind === 'planned' };
      case 'skipped-exists':
        return { status: 'rename-skipped-exists', task, newName };
      case 'failed':
        return { status: 'rename-failed', task, newName, message: renamed.message };
    }
  }
}
