import { ErrorCodes, SecurityError } from '../../utils/errors.js';
import type { CatalogKind } from '../catalog/types.js';

/**
 * Reject item names that could address anything outside the catalog directory.
 * Runs before any filesystem access.
 *
 * @throws SecurityError for empty names, path separators, `..`, or a leading dot
 */
export function validateItemName(kind: CatalogKind, itemName: string): void {
  const invalid =
    itemName.length === 0 ||
    itemName.includes('/') ||
    itemName.includes('\\') ||
    itemName.includes('..') ||
    itemName.startsWith('.');

  if (invalid) {
    throw new SecurityError(
      ErrorCodes.INVALID_ITEM_NAME,
      `Invalid ${kind} name: '${itemName}' (no paths allowed)`,
      { kind, itemName }
    );
  }
}
