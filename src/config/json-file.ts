import { existsSync, readFileSync } from 'node:fs';
import type { z } from 'zod';

/**
 * Read a JSON file and validate it against `schema`.
 * Returns null when the file is missing. A file that is not JSON or has
 * the wrong shape throws `Invalid <path>: <detail>`.
 */
export function readJsonFile<S extends z.ZodTypeAny>(filePath: string, schema: S): z.output<S> | null {
  if (!existsSync(filePath)) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid ${filePath}: not valid JSON (${detail})`);
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new Error(`Invalid ${filePath}: ${issues}`);
  }
  return result.data;
}
