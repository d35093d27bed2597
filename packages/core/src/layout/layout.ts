/**
 * Repository Layout
 *
 * Resolves every path the engine reads or writes. Repository-wide state lives
 * under <root>/.phasegate/{engine,local,app}; per-module state lives under
 * <module>/.phasegate/{tasks,run}.
 *
 * Artifact references stored in events are repository-relative posix paths,
 * so a repository can move on disk without invalidating its history.
 *
 * @module @phasegate/core/layout
 */

import { isAbsolute, join, relative, resolve, sep } from 'node:path';
import type { ApprovalKind } from '../schemas/task.js';
import type { ManifestGate } from '../schemas/proofs.js';

/**
 * Name of the state directory at the repository root and in each module
 */
export const STATE_DIR = '.phasegate';

export class Layout {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  get stateRoot(): string {
    return join(this.root, STATE_DIR);
  }

  // Engine (shipped defaults)
  get engineDir(): string {
    return join(this.stateRoot, 'engine');
  }

  get engineVersionFile(): string {
    return join(this.engineDir, 'VERSION');
  }

  get engineProfilesDir(): string {
    return join(this.engineDir, 'profiles');
  }

  // Local (operator overrides)
  get localDir(): string {
    return join(this.stateRoot, 'local');
  }

  get localConfigFile(): string {
    return join(this.localDir, 'config.json');
  }

  get localProfilesDir(): string {
    return join(this.localDir, 'profiles');
  }

  get patchesDir(): string {
    return join(this.localDir, 'patches');
  }

  // App (runtime state)
  get appDir(): string {
    return join(this.stateRoot, 'app');
  }

  get eventLogFile(): string {
    return join(this.appDir, 'eventlog.sqlite');
  }

  get registryFile(): string {
    return join(this.appDir, 'registry.json');
  }

  get incidentLogFile(): string {
    return join(this.appDir, 'logs', 'incidents.jsonl');
  }

  /**
   * Absolute module root for a registry path
   */
  moduleRoot(modulePath: string): string {
    return resolve(this.root, modulePath);
  }

  moduleStateRoot(modulePath: string): string {
    return join(this.moduleRoot(modulePath), STATE_DIR);
  }

  tasksDir(modulePath: string): string {
    return join(this.moduleStateRoot(modulePath), 'tasks');
  }

  task(modulePath: string, taskId: string): TaskPaths {
    return new TaskPaths(this.moduleStateRoot(modulePath), taskId);
  }

  /**
   * Repository-relative posix reference for an absolute path
   */
  toRef(absolutePath: string): string {
    return relative(this.root, absolutePath).split(sep).join('/');
  }

  /**
   * Absolute path for a stored reference
   */
  fromRef(ref: string): string {
    return isAbsolute(ref) ? ref : join(this.root, ...ref.split('/'));
  }
}

/**
 * Paths for one task inside its module state root
 */
export class TaskPaths {
  readonly taskDir: string;
  readonly runDir: string;

  constructor(moduleStateRoot: string, readonly taskId: string) {
    this.taskDir = join(moduleStateRoot, 'tasks', taskId);
    this.runDir = join(moduleStateRoot, 'run', 'tasks', taskId);
  }

  get taskFile(): string {
    return join(this.taskDir, 'task.json');
  }

  get planFile(): string {
    return join(this.taskDir, 'plan.md');
  }

  get slicesFile(): string {
    return join(this.taskDir, 'slices.json');
  }

  get criticFile(): string {
    return join(this.taskDir, 'critic_report.json');
  }

  get freezeFile(): string {
    return join(this.taskDir, 'freeze.json');
  }

  approvalFile(kind: ApprovalKind): string {
    return join(this.taskDir, 'approvals', `${kind}.json`);
  }

  get retroFile(): string {
    return join(this.taskDir, 'retro.md');
  }

  get incidentsFile(): string {
    return join(this.taskDir, 'incidents.jsonl');
  }

  get decisionsFile(): string {
    return join(this.taskDir, 'decisions.jsonl');
  }

  get proofsDir(): string {
    return join(this.runDir, 'proofs');
  }

  proofFile(sliceId: string, gate: ManifestGate): string {
    return join(this.proofsDir, sliceId, `${gate}.json`);
  }

  manifestFile(sliceId: string): string {
    return join(this.proofsDir, sliceId, 'manifest.json');
  }

  get readyProofFile(): string {
    return join(this.proofsDir, 'ready.json');
  }

  get handoffFile(): string {
    return join(this.proofsDir, 'READY', 'handoff.md');
  }

  get logsDir(): string {
    return join(this.runDir, 'logs');
  }
}
