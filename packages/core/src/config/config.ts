/**
 * Configuration Loading
 *
 * Local config and gate profiles. Profiles resolve as
 * built-in default <- engine profile <- local override, deep-merging
 * objects and replacing lists.
 *
 * @module @phasegate/core/config
 */

import { join } from 'node:path';
import { z } from 'zod';
import { readTextIfExists } from '../artifacts/artifact-store.js';
import { SchemaValidationError } from '../reliability/errors.js';
import { DEFAULT_PROFILE, LocalConfig, Profile } from '../schemas/config.js';
import { parseRecord } from '../schemas/parse.js';
import type { Layout } from '../layout/layout.js';

const JsonObject = z.record(z.string(), z.unknown());

type JsonObject = z.infer<typeof JsonObject>;

function isJsonObject(value: unknown): value is JsonObject {
  return JsonObject.safeParse(value).success && !Array.isArray(value);
}

async function readJsonObject(path: string, kind: string): Promise<JsonObject | null> {
  const text = await readTextIfExists(path);
  if (text === null) {
    return null;
  }
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new SchemaValidationError(kind, ['file is not valid JSON'], {
      path,
      cause: error instanceof Error ? error : undefined,
    });
  }
  return parseRecord(JsonObject, kind, data, path);
}

/**
 * Deep-merge two JSON objects. Nested objects merge; lists and scalars
 * from the override replace the base value.
 */
export function mergeDeep(base: JsonObject, override: JsonObject): JsonObject {
  const merged: JsonObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isJsonObject(current) && isJsonObject(value) ? mergeDeep(current, value) : value;
  }
  return merged;
}

/**
 * Load .phasegate/local/config.json, filling defaults for missing keys
 */
export async function loadLocalConfig(layout: Layout): Promise<LocalConfig> {
  const raw = await readJsonObject(layout.localConfigFile, 'local config');
  return parseRecord(LocalConfig, 'local config', raw ?? {}, layout.localConfigFile);
}

/**
 * Resolve a named profile
 */
export async function loadProfile(layout: Layout, name: string): Promise<Profile> {
  let merged: JsonObject = name === DEFAULT_PROFILE.name ? { ...DEFAULT_PROFILE } : { ...DEFAULT_PROFILE, name };

  for (const dir of [layout.engineProfilesDir, layout.localProfilesDir]) {
    const path = join(dir, `${name}.json`);
    const override = await readJsonObject(path, 'profile');
    if (override) {
      merged = mergeDeep(merged, override);
    }
  }

  return parseRecord(Profile, 'profile', merged, name);
}

/**
 * Actor recorded on events when a command names none
 */
export function defaultActor(): string {
  const fromEnv = process.env.PHASEGATE_ACTOR?.trim();
  return fromEnv ? fromEnv : 'engine';
}
