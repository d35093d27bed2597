/**
 * Engine version
 *
 * @module @phasegate/core/version
 */

import { readFileSync } from 'node:fs';

export const ENGINE_VERSION = '0.4.0';

/**
 * Version stamped on events: the installed engine's VERSION file when
 * present, otherwise the package constant.
 */
export function readEngineVersion(versionFile: string): string {
  try {
    const text = readFileSync(versionFile, 'utf-8').trim();
    return text.length > 0 ? text : ENGINE_VERSION;
  } catch {
    return ENGINE_VERSION;
  }
}
