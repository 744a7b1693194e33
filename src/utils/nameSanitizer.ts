/**
 * Filename token sanitization
 */

const INVALID_FILENAME_CHARS = /[<>:"/\\|?*]/g;

/**
 * Make free text safe to use as part of a filename
 * - Remove characters rejected by common filesystems: <>:"/\|?*
 * - Trim, then turn every whitespace run into a single underscore
 *   (trimming first keeps "Acme Corp " as Acme_Corp rather than Acme_Corp_)
 * - Strip leading and trailing dots
 */
export function sanitizeFileNameToken(text: string): string {
  return text
    .replace(INVALID_FILENAME_CHARS, '')
    .trim()
    .replace(/\s+/g, '_')
    .replace(/^\.+|\.+$/g, '');
}
