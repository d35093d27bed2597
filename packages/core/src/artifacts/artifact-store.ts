/**
 * Artifact Store
 *
 * Reads and writes structured artifacts. Every write goes to a temp file in
 * the target directory, is flushed, and is renamed over the destination, so
 * a concurrent reader sees either the old file or the new one, never a
 * truncated one.
 *
 * @module @phasegate/core/artifacts/artifact-store
 */

import { promises as fs } from 'node:fs';
import { randomBytes } from 'node:crypto';
import { dirname } from 'node:path';
import type { z } from 'zod';
import { NotFoundError, SchemaValidationError } from '../reliability/errors.js';
import { parseRecord } from '../schemas/parse.js';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Check whether a file exists
 */
export async function pathExists(path: string): Promise<boolean> {
  try {
    await fs.access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Atomically write text content
 */
export async function writeTextAtomic(path: string, content: string): Promise<string> {
  const dir = dirname(path);
  await fs.mkdir(dir, { recursive: true });

  const tmp = `${path}.tmp.${randomBytes(4).toString('hex')}`;
  try {
    const handle = await fs.open(tmp, 'w', 0o644);
    try {
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tmp, path);
  } catch (error) {
    await fs.rm(tmp, { force: true });
    throw error;
  }
  return path;
}

/**
 * Atomically write a JSON artifact (2-space indent, trailing newline)
 */
export async function writeJsonAtomic(path: string, data: unknown): Promise<string> {
  return writeTextAtomic(path, `${JSON.stringify(data, null, 2)}\n`);
}

/**
 * Validate then atomically write a record, so invalid state never reaches disk
 */
export async function writeRecord<S extends z.ZodTypeAny>(
  path: string,
  schema: S,
  kind: string,
  data: z.input<S>
): Promise<z.output<S>> {
  const record = parseRecord(schema, kind, data, path);
  await writeJsonAtomic(path, record);
  return record;
}

/**
 * Read a text file, or null when it does not exist
 */
export async function readTextIfExists(path: string): Promise<string | null> {
  try {
    return await fs.readFile(path, 'utf-8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

function parseJson(text: string, kind: string, path: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new SchemaValidationError(kind, ['file is not valid JSON'], { path, cause });
  }
}

/**
 * Read and validate a record, or null when the file does not exist
 */
export async function readRecordIfExists<S extends z.ZodTypeAny>(
  path: string,
  schema: S,
  kind: string
): Promise<z.output<S> | null> {
  const text = await readTextIfExists(path);
  if (text === null) {
    return null;
  }
  return parseRecord(schema, kind, parseJson(text, kind, path), path);
}

/**
 * Read and validate a record that must exist
 */
export async function readRecord<S extends z.ZodTypeAny>(path: string, schema: S, kind: string): Promise<z.output<S>> {
  const record = await readRecordIfExists(path, schema, kind);
  if (record === null) {
    throw new NotFoundError(`Missing ${kind} at ${path}`, { kind, path });
  }
  return record;
}

/**
 * Append one validated record as a JSON line
 */
export async function appendJsonLine<S extends z.ZodTypeAny>(
  path: string,
  schema: S,
  kind: string,
  data: z.input<S>
): Promise<z.output<S>> {
  const record = parseRecord(schema, kind, data, path);
  await fs.mkdir(dirname(path), { recursive: true });
  await fs.appendFile(path, `${JSON.stringify(record)}\n`, 'utf-8');
  return record;
}

/**
 * Read every record of a JSON-lines file (empty when missing)
 */
export async function readJsonLines<S extends z.ZodTypeAny>(
  path: string,
  schema: S,
  kind: string
): Promise<Array<z.output<S>>> {
  const text = await readTextIfExists(path);
  if (text === null) {
    return [];
  }

  return text
    .split('\n')
    .filter((line) => line.trim().length > 0)
    .map((line, index) => parseRecord(schema, kind, parseJson(line, kind, `${path}:${index + 1}`), path));
}
