/**
 * Configuration and supported document types
 */

import { LogLevel } from './utils/logger';

export const DEFAULT_MODEL = 'gemini-2.5-flash-lite';
export const DEFAULT_EXTENSION = '.pdf';

/**
 * Document types the extraction service accepts as inline data
 */
export const SUPPORTED_MIME_TYPES: { [extension: string]: string } = {
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
  '.heic': 'image/heic',
  '.heif': 'image/heif',
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Get configuration from environment variables (.env is loaded by the CLI)
 */
export class Config {
  private static getOptionalProperty(key: string): string | undefined {
    const value = process.env[key]?.trim();
    return value ? value : undefined;
  }

  private static getProperty(key: string): string {
    const value = this.getOptionalProperty(key);
    if (!value) {
      throw new ConfigurationError(`Configuration not found: ${key}`);
    }
    return value;
  }

  /**
   * GEMINI_API_KEY, falling back to GOOGLE_API_KEY
   */
  static getGeminiApiKey(): string {
    return this.getOptionalProperty('GEMINI_API_KEY') ?? this.getProperty('GOOGLE_API_KEY');
  }

  static getModelName(): string {
    return this.getOptionalProperty('GEMINI_MODEL') ?? DEFAULT_MODEL;
  }

  static getLogLevel(): LogLevel {
    const value = this.getOptionalProperty('LOG_LEVEL')?.toLowerCase();
    if (!value) {
      return 'info';
    }
    const level = LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) {
      throw new ConfigurationError(
        `Invalid LOG_LEVEL: ${value}. Expected one of: ${LOG_LEVELS.join(', ')}`
      );
    }
    return level;
  }
}

/**
 * Lower-case the extension and add the leading dot if missing
 * Throws for types the extraction service cannot read
 */
export function normalizeExtension(extension: string): string {
  const trimmed = extension.trim().toLowerCase();
  const normalized = trimmed.startsWith('.') ? trimmed : `.${trimmed}`;

  if (!(normalized in SUPPORTED_MIME_TYPES)) {
    throw new ConfigurationError(
      `Unsupported file type: ${extension}. Supported: ${Object.keys(SUPPORTED_MIME_TYPES).join(', ')}`
    );
  }

  return normalized;
}

export function getMimeType(extension: string): string {
  const mimeType = SUPPORTED_MIME_TYPES[extension.toLowerCase()];
  if (!mimeType) {
    throw new ConfigurationError(`Unsupported file type: ${extension}`);
  }
  return mimeType;
}
