/**
 * Package metadata
 * Version comes from package.json; the long description from README.md.
 */

import { existsSync, readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { z } from 'zod';

export const FALLBACK_DESCRIPTION = 'GitHub repository batch classification clone script';

const packageJsonSchema = z.object({ version: z.string() });

// src/ under tsx and vitest, dist/ once built; package.json sits one level up either way
const packageRoot = join(dirname(fileURLToPath(import.meta.url)), '..');

export const VERSION: string = packageJsonSchema.parse(
  JSON.parse(readFileSync(join(packageRoot, 'package.json'), 'utf-8'))
).version;

export const README_PATH = join(packageRoot, 'README.md');

/**
 * README contents, or FALLBACK_DESCRIPTION when the file is absent
 */
export function readLongDescription(readmePath: string = README_PATH): string {
  if (!existsSync(readmePath)) {
    return FALLBACK_DESCRIPTION;
  }
  return readFileSync(readmePath, 'utf-8');
}
