/**
 * Type definitions for the invoice renamer
 */

/**
 * Fields read from one invoice document
 */
export interface ExtractedRecord {
  readonly issuer: string;
  readonly category: string;
  readonly issueDate: string;
}

export type ExtractionFailureKind =
  | 'response-malformed'
  | 'service-unavailable'
  | 'service-error';

export interface ExtractionFailure {
  kind: ExtractionFailureKind;
  message: string;
  status?: number;
}

export type ExtractionResult =
  | { ok: true; record: ExtractedRecord }
  | { ok: false; failure: ExtractionFailure };

/**
 * Anything able to turn document bytes into an ExtractedRecord
 */
export interface InvoiceExtractor {
  extract(fileBytes: Buffer, mimeType: string): Promise<ExtractionResult>;
}

export interface FileTask {
  sourcePath: string;
  fileName: string;
  originalExtension: string;
}

export type RenameOutcome =
  | { kind: 'renamed'; destinationPath: string }
  | { kind: 'planned'; destinationPath: string }
  | { kind: 'skipped-exists'; destinationPath: string }
  | { kind: 'failed'; destinationPath: string; message: string };

export type FileProcessingStatus =
  | 'renamed'
  | 'extract-failed'
  | 'rename-skipped-exists'
  | 'rename-failed'
  | 'error';

export type FileOutcome =
  | { status: 'renamed'; task: FileTask; newName: string; dryRun: boolean }
  | { status: 'extract-failed'; task: FileTask; failure: ExtractionFailure }
  | { status: 'rename-skipped-exists'; task: FileTask; newName: string }
  | { status: 'rename-failed'; task: FileTask; newName: string; message: string }
  | { status: 'error'; task: FileTask; message: string };

export type BatchStatus = 'completed' | 'folder-invalid' | 'no-files' | 'cancelled';

export interface BatchResult {
  status: BatchStatus;
  succeeded: number;
  total: number;
  outcomes: FileOutcome[];
}
