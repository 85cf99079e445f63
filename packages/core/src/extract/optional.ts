// packages/core/src/extract/optional.ts — Lazy loading for format libraries

import type { FormatTag } from '../types/analysis.js';
import { ExtractionError } from '../utils/errors.js';

function isModuleNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ERR_MODULE_NOT_FOUND' || error.code === 'MODULE_NOT_FOUND')
  );
}

/**
 * Import an optional dependency, turning a missing package into an
 * ExtractionError with the install command.
 */
export async function importOptional<T>(
  format: FormatTag,
  packageName: string,
  load: () => Promise<T>,
): Promise<T> {
  try {
    return await load();
  } catch (error) {
    if (isModuleNotFound(error)) {
      throw new ExtractionError(
        `${packageName} is not installed. Run: npm install ${packageName}`,
        format,
        'missing-dependency',
      );
    }
    throw error;
  }
}
