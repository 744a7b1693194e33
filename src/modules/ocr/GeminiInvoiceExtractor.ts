/**
 * Gemini API integration for invoice metadata extraction
 */

import { ApiError, GenerateContentParameters } from '@google/genai';
import {
  ExtractionFailure,
  ExtractionFailureKind,
  ExtractionResult,
  InvoiceExtractor,
} from '../../types';
import { AppLogger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/errorUtils';
import {
  buildExtractionPrompt,
  INVOICE_RESPONSE_SCHEMA,
  InvoiceResponseSchema,
} from './InvoiceExtractionPrompt';

/**
 * The part of the Gemini client used here; `new GoogleGenAI(...).models` satisfies it
 */
export interface ContentGenerator {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string | undefined }>;
}

export interface GeminiInvoiceExtractorOptions {
  model: string;
  /** Year the model should assume when the document omits it; defaults to the clock */
  currentYear?: number;
}

export class GeminiInvoiceExtractor implements InvoiceExtractor {
  private client: ContentGenerator;
  private model: string;
  private currentYear: number;

  constructor(client: ContentGenerator, options: GeminiInvoiceExtractorOptions) {
    this.client = client;
    this.model = options.model;
    this.currentYear = options.currentYear ?? new Date().getFullYear();
  }

  /**
   * Extract issuer, category and issue date from a document
   * Makes exactly one service call and never throws
   */
  async extract(fileBytes: Buffer, mimeType: string): Promise<ExtractionResult> {
    let text: string | undefined;

    try {
      const response = await this.client.generateContent(this.buildRequest(fileBytes, mimeType));
      text = response.text;
    } catch (error) {
      return { ok: false, failure: this.toServiceFailure(error) };
    }

    AppLogger.debug(`Gemini response: ${text ?? '<empty>'}`);
    return this.parseResponse(text);
  }

  private buildRequest(fileBytes: Buffer, mimeType: string): GenerateContentParameters {
    return {
      model: this.model,
      contents: [
        {
          role: 'user',
          parts: [
            {
              inlineData: {
                data: fileBytes.toString('base64'),
                mimeType,
              },
            },
            { text: buildExtractionPrompt({ currentYear: this.currentYear }) },
          ],
        },
      ],
      config: {
        responseMimeType: 'application/json',
        responseSchema: INVOICE_RESPONSE_SCHEMA,
      },
    };
  }

  /**
   * Decode and validate the response text
   */
  private parseResponse(text: string | undefined): ExtractionResult {
    if (!text) {
      return this.malformed('Empty response from Gemini');
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(text);
    } catch (error) {
      return this.malformed(`Failed to parse JSON response: ${getErrorMessage(error)}`);
    }

    const parsed = InvoiceResponseSchema.safeParse(decoded);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return this.malformed(`Unexpected response shape: ${issues}`);
    }

    const { issuer, category, issueDate } = parsed.data;
    return { ok: true, record: { issuer, category, issueDate } };
  }

  private malformed(message: string): ExtractionResult {
    return { ok: false, failure: { kind: 'response-malformed', message } };
  }

  /**
   * ApiError means the service answered with an error status;
   * anything else means no answer came back at all
   */
  private toServiceFailure(error: unknown): ExtractionFailure {
    if (error instanceof ApiError) {
      const kind: ExtractionFailureKind =
        error.status === 503 ? 'service-unavailable' : 'service-error';
      return { kind, message: error.message, status: error.status };
    }

    return { kind: 'service-unavailable', message: getErrorMessage(error) };
  }
}
