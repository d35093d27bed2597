/**
 * Module Registry
 *
 * Maps module ids to their directories. Only the lookup surface lives here;
 * registration is driven by the engine so it can be audited.
 *
 * @module @phasegate/core/registry
 */

import { writeRecord, readRecordIfExists } from '../artifacts/artifact-store.js';
import { NotFoundError } from '../reliability/errors.js';
import { Registry, type ModuleEntry } from '../schemas/config.js';
import type { Layout } from '../layout/layout.js';

export const EMPTY_REGISTRY: Registry = { schema_version: 1, modules: [] };

export async function readRegistry(layout: Layout): Promise<Registry> {
  return (await readRecordIfExists(layout.registryFile, Registry, 'registry')) ?? EMPTY_REGISTRY;
}

export async function writeRegistry(layout: Layout, registry: Registry): Promise<Registry> {
  return writeRecord(layout.registryFile, Registry, 'registry', registry);
}

/**
 * Look up a registered module, throwing NotFoundError for unknown ids
 */
export async function findModule(layout: Layout, moduleId: string): Promise<ModuleEntry> {
  const registry = await readRegistry(layout);
  const entry = registry.modules.find((m) => m.module_id === moduleId);
  if (!entry) {
    throw new NotFoundError(`Module not registered: ${moduleId}`, {
      moduleId,
      known: registry.modules.map((m) => m.module_id),
    });
  }
  return entry;
}
