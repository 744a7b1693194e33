/**
 * Invoice extraction prompt and response schema for Gemini API
 */

import { Schema, Type } from '@google/genai';
import { z } from 'zod';

/**
 * Template variables for prompt customization
 */
export interface PromptTemplateVariables {
  currentYear: number;
}

export const INVOICE_EXTRACTION_PROMPT = `From this invoice retrieve the following information:
- issuer: the name of the company that issued the invoice
- category: a one word English description of what was billed (for instance "subscription", "course", "insurance")
- issueDate: the issue date in dd-mm-yyyy format

If the year is not present in the invoice, assume it is {{CURRENT_YEAR}}.
Make sure the category is a single English word.`;

/**
 * Structured output requested from the model
 */
export const INVOICE_RESPONSE_SCHEMA: Schema = {
  type: Type.OBJECT,
  properties: {
    issuer: { type: Type.STRING },
    category: { type: Type.STRING },
    issueDate: { type: Type.STRING },
  },
  required: ['issuer', 'category', 'issueDate'],
};

/**
 * Validation applied to the decoded response before it becomes an ExtractedRecord
 */
export const InvoiceResponseSchema = z.object({
  issuer: z.string(),
  category: z.string(),
  issueDate: z.string(),
});

export type InvoiceResponse = z.infer<typeof InvoiceResponseSchema>;

export function buildExtractionPrompt(variables: PromptTemplateVariables): string {
  return INVOICE_EXTRACTION_PROMPT.replace(/\{\{CURRENT_YEAR\}\}/g, String(variables.currentYear));
}
