/**
 * Configuration Record Types
 *
 * Local operator configuration, gate profiles and the module registry.
 *
 * @module @phasegate/core/schemas/config
 */

import { z } from 'zod';
import { DEFAULT_REQUIRED_GATES, RequiredGate } from './task.js';

// =============================================================================
// Local Config (.phasegate/local/config.json)
// =============================================================================

export const UserCheckMode = z.enum(['profile_optional', 'always', 'never']);

export type UserCheckMode = z.infer<typeof UserCheckMode>;

export const LocalConfig = z.object({
  default_profile: z.string().min(1).default('default'),
  /** Empty means every command not on the deny-list is allowed */
  allowlist_commands: z.array(z.string()).default([]),
  denylist_commands: z.array(z.string()).default(['rm', 'sudo', 'curl', 'wget']),
  user_check_mode: UserCheckMode.default('profile_optional'),
  default_max_attempts: z.number().int().positive().default(2),
  replay_window: z.number().int().positive().default(5000),
});

export type LocalConfig = z.infer<typeof LocalConfig>;

// =============================================================================
// Profiles
// =============================================================================

export const Profile = z.object({
  name: z.string().min(1),
  required_gates: z.array(RequiredGate),
  default_commands: z.record(z.string(), z.array(z.string())),
  e2e: z.object({
    required: z.boolean(),
    commands: z.array(z.string()),
  }),
  user_check_required: z.boolean(),
});

export type Profile = z.infer<typeof Profile>;

export const DEFAULT_PROFILE: Profile = {
  name: 'default',
  required_gates: [...DEFAULT_REQUIRED_GATES],
  default_commands: {},
  e2e: { required: false, commands: [] },
  user_check_required: false,
};

// =============================================================================
// Module Registry (.phasegate/app/registry.json)
// =============================================================================

export const ModuleEntry = z.object({
  module_id: z.string().regex(/^[a-z0-9][a-z0-9._-]*$/i, 'module ids are alphanumeric with . _ -'),
  /** Path relative to the repository root, posix separators */
  path: z.string().min(1),
  registered_at: z.string().datetime(),
});

export type ModuleEntry = z.infer<typeof ModuleEntry>;

export const Registry = z.object({
  schema_version: z.literal(1),
  modules: z.array(ModuleEntry),
});

export type Registry = z.infer<typeof Registry>;
