/**
 * Final run summary and process exit code
 */

import { BatchResult } from '../../types';
import { AppLogger } from '../../utils/logger';

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_INVALID_FOLDER = 2;

/**
 * 0 only when every discovered file was renamed
 */
export function getExitCode(result: BatchResult): number {
  switch (result.status) {
    case 'folder-invalid':
      return EXIT_INVALID_FOLDER;
    case 'no-files':
    case 'cancelled':
      return EXIT_FAILURE;
    case 'completed':
      return result.total > 0 && result.succeeded === result.total ? EXIT_SUCCESS : EXIT_FAILURE;
  }
}

/**
 * Log the summary lines for a finished run and return its exit code
 */
export function reportBatchResult(result: BatchResult): number {
  if (result.status === 'folder-invalid') {
    AppLogger.error('Target folder is not usable, no files were processed');
    return getExitCode(result);
  }

  if (result.status === 'no-files') {
    AppLogger.error('No files were processed');
    return getExitCode(result);
  }

  AppLogger.info(
    `Processing completed: ${result.succeeded}/${result.total} files processed successfully`
  );

  const failed = result.outcomes.length - result.succeeded;
  const skipped = result.total - result.outcomes.length;

  if (result.status === 'cancelled') {
    AppLogger.warn(`Run cancelled: ${failed} failed, ${skipped} not processed`);
  } else if (failed === 0) {
    AppLogger.info('All files processed successfully!');
  } else {
    AppLogger.warn(`Some files failed to process (${failed} failures)`);
    for (const outcome of result.outcomes) {
      if (outcome.status !== 'renamed') {
        AppLogger.warn(`  ${outcome.task.fileName}: ${outcome.status}`);
      }
    }
  }

  return getExitCode(result);
}
