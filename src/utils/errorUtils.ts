/**
 * Normalize thrown values
 */

import { types } from 'util';

/**
 * isNativeError also accepts errors created in another realm (vm contexts, Jest)
 * where `instanceof Error` is false
 */
export function toError(value: unknown): Error {
  return types.isNativeError(value) ? value : new Error(String(value));
}

export function getErrorMessage(value: unknown): string {
  return toError(value).message;
}

export function isNodeError(value: unknown): value is NodeJS.ErrnoException {
  return types.isNativeError(value) && 'code' in value;
}
