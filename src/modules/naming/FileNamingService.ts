/**
 * File naming service
 */

import { ExtractedRecord } from '../../types';
import { AppLogger } from '../../utils/logger';
import { normalizeIssueDate } from '../../utils/dateUtils';
import { sanitizeFileNameToken } from '../../utils/nameSanitizer';

export class FileNamingService {
  /**
   * Generate file name from extracted invoice fields
   * Format: Issuer_Category_YYYYMMDD{extension}
   *
   * Empty tokens and collisions are left to the renamer.
   */
  generate(record: ExtractedRecord, originalExtension: string): string {
    const issuer = sanitizeFileNameToken(record.issuer);
    const category = sanitizeFileNameToken(record.category);
    const issueDate = normalizeIssueDate(record.issueDate);
    const fileName = `${issuer}_${category}_${issueDate}${originalExtension}`;

    AppLogger.debug(`Generated file name: ${fileName}`);

    return fileName;
  }
}
