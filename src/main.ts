#!/usr/bin/env node
/**
 * Command line entry point
 */

import 'dotenv/config';
import { GoogleGenAI } from '@google/genai';
import { Command } from 'commander';
import { Config, ConfigurationError, DEFAULT_EXTENSION, normalizeExtension } from './config';
import { InvoiceBatchProcessor } from './modules/batch/InvoiceBatchProcessor';
import { EXIT_FAILURE, reportBatchResult } from './modules/batch/BatchSummary';
import { LocalFileRenamer } from './modules/files/LocalFileRenamer';
import { GeminiInvoiceExtractor } from './modules/ocr/GeminiInvoiceExtractor';
import { AppLogger } from './utils/logger';
import { toError } from './utils/errorUtils';

export interface CliOptions {
  extension: string;
  model?: string;
  dryRun?: boolean;
  verbose?: boolean;
}

/**
 * Rename every matching invoice in the folder and return the process exit code
 */
export async function runInvoiceRenamer(folder: string, options: CliOptions): Promise<number> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    if (controller.signal.aborted) {
      AppLogger.warn('Second interrupt received, exiting immediately');
      process.exit(EXIT_FAILURE);
    }
    AppLogger.warn('Interrupt received, stopping after the current file');
    controller.abort();
  };

  try {
    AppLogger.setLevel(options.verbose ? 'debug' : Config.getLogLevel());

    const extension = normalizeExtension(options.extension);
    const client = new GoogleGenAI({ apiKey: Config.getGeminiApiKey() });
    const extractor = new GeminiInvoiceExtractor(client.models, {
      model: options.model ?? Config.getModelName(),
    });

    const processor = new InvoiceBatchProcessor(
      {
        extractor,
        renamer: new LocalFileRenamer({ dryRun: options.dryRun ?? false }),
      },
      { folderPath: folder, extension, signal: controller.signal }
    );

    process.on('SIGINT', onInterrupt);
    const result = await processor.processFolder();
    return reportBatchResult(result);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      AppLogger.error(error.message);
    } else {
      AppLogger.error('Unexpected error', toError(error));
    }
    return EXIT_FAILURE;
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('invoice-renamer')
    .description('Rename invoice documents from their issuer, category and issue date')
    .version('1.0.0')
    .argument('<folder>', 'Folder containing the invoice documents')
    .option('-e, --extension <ext>', 'Document type to process', DEFAULT_EXTENSION)
    .option('-m, --model <model>', 'Gemini model name (default: GEMINI_MODEL or gemini-2.5-flash-lite)')
    .option('-n, --dry-run', 'Show the new names without renaming anything')
    .option('-v, --verbose', 'Enable debug logging')
    .addHelpText(
      'after',
      `
Examples:
  $ invoice-renamer ~/Documents/invoices
  $ invoice-renamer ./scans --extension jpg --verbose
  $ invoice-renamer ./invoices --dry-run`
    )
    .action(async (folder: string, options: CliOptions) => {
      process.exitCode = await runInvoiceRenamer(folder, options);
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      AppLogger.error('Unexpected error', toError(error));
      process.exitCode = EXIT_FAILURE;
    });
}
