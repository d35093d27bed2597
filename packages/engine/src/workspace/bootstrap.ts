/**
 * Workspace Bootstrap and Module Registration
 *
 * Creates the repository state tree and seeds default files. Existing files
 * are never overwritten, so bootstrap can run any number of times.
 *
 * @module @phasegate/engine/workspace/bootstrap
 */

import { promises as fs } from 'node:fs';
import { isAbsolute, join, normalize, relative, sep } from 'node:path';
import {
  ConfigurationError,
  DEFAULT_PROFILE,
  ENGINE_VERSION,
  EMPTY_REGISTRY,
  LocalConfig,
  ModuleEntry,
  Profile,
  Registry,
  pathExists,
  readRegistry,
  writeRecord,
  writeRegistry,
  writeTextAtomic,
} from '@phasegate/core';
import { emit, timestamp, type EngineContext } from '../context.js';
import { trackCommand } from './command-tracking.js';

export interface BootstrapResult {
  root: string;
  /** Files written by this run; empty when everything already existed */
  created: string[];
}

async function seed(path: string, write: () => Promise<unknown>, created: string[]): Promise<void> {
  if (await pathExists(path)) {
    return;
  }
  await write();
  created.push(path);
}

/**
 * Create .phasegate/{engine,local,app} with default config, profile,
 * VERSION and an empty registry
 */
export async function bootstrap(ctx: EngineContext): Promise<BootstrapResult> {
  return trackCommand(ctx, 'bootstrap', {}, async () => {
    const { layout } = ctx;
    for (const dir of [layout.engineProfilesDir, layout.localProfilesDir, layout.patchesDir, layout.appDir]) {
      await fs.mkdir(dir, { recursive: true });
    }

    const created: string[] = [];
    await seed(layout.engineVersionFile, () => writeTextAtomic(layout.engineVersionFile, `${ENGINE_VERSION}\n`), created);

    const profilePath = join(layout.engineProfilesDir, `${DEFAULT_PROFILE.name}.json`);
    await seed(profilePath, () => writeRecord(profilePath, Profile, 'profile', DEFAULT_PROFILE), created);
    await seed(layout.localConfigFile, () => writeRecord(layout.localConfigFile, LocalConfig, 'local config', {}), created);
    await seed(layout.registryFile, () => writeRecord(layout.registryFile, Registry, 'registry', EMPTY_REGISTRY), created);

    ctx.logger.info('Bootstrap finished', { created: created.length });
    return { root: layout.root, created: created.map((path) => layout.toRef(path)) };
  });
}

/**
 * Registry path for a module directory: repository-relative, posix
 */
export function normalizeModulePath(root: string, path: string): string {
  const rel = isAbsolute(path) ? relative(root, path) : normalize(path);
  const posix = rel.split(sep).join('/').replace(/\/+$/, '');
  if (posix === '..' || posix.startsWith('../') || isAbsolute(posix)) {
    throw new ConfigurationError(`Module path ${path} is outside the repository`, { path });
  }
  return posix === '' ? '.' : posix;
}

export interface RegisterModuleInput {
  moduleId: string;
  path: string;
}

/**
 * Register a module directory. Registering the same id and path again is a
 * no-op; the same id with another path is an error.
 */
export async function registerModule(ctx: EngineContext, input: RegisterModuleInput): Promise<ModuleEntry> {
  const path = normalizeModulePath(ctx.layout.root, input.path);
  const registry = await readRegistry(ctx.layout);
  const existing = registry.modules.find((m) => m.module_id === input.moduleId);

  if (existing) {
    if (existing.path !== path) {
      throw new ConfigurationError(`Module ${input.moduleId} is already registered at ${existing.path}`, {
        moduleId: input.moduleId,
        path: existing.path,
        requested: path,
      });
    }
    return existing;
  }

  const entry: ModuleEntry = { module_id: input.moduleId, path, registered_at: timestamp(ctx) };
  const saved = await writeRegistry(ctx.layout, { ...registry, modules: [...registry.modules, entry] });
  await fs.mkdir(ctx.layout.tasksDir(path), { recursive: true });

  await emit(ctx, {
    type: 'module.registered',
    module_id: input.moduleId,
    payload: { path },
    artifacts: [ctx.layout.registryFile],
  });

  return saved.modules.find((m) => m.module_id === input.moduleId) ?? entry;
}
