'use strict';

import * as fs from 'fs';
import * as path from 'path';
import type { ZodType, ZodTypeDef } from 'zod';

export type JsonReadResult<T> =
  | { status: 'ok'; value: T }
  | { status: 'missing' }
  | { status: 'invalid'; reason: string };

/**
 * Reads and validates a JSON document. Missing and malformed files are
 * reported, not thrown, so callers can fall back to defaults.
 */
export function readJsonFile<T>(filePath: string, schema: ZodType<T, ZodTypeDef, unknown>): JsonReadResult<T> {
  let raw: string;

  try {
    raw = fs.readFileSync(filePath, 'utf8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return { status: 'missing' };
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return { status: 'invalid', reason: `${path.basename(filePath)} is not valid JSON.` };
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
    return { status: 'invalid', reason: `${path.basename(filePath)}${where}: ${issue?.message ?? 'unexpected shape'}.` };
  }

  return { status: 'ok', value: result.data };
}

/** Written to a temp file and renamed into place. */
export function writeJsonFile(filePath: string, value: unknown) {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tempPath, `${JSON.stringify(value, null, 2)}\n`, 'utf8');
  fs.renameSync(tempPath, filePath);
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
