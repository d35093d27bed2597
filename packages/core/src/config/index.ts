/**
 * Configuration
 *
 * @module @phasegate/core/config
 */

export { loadLocalConfig, loadProfile, mergeDeep, defaultActor } from './config.js';
