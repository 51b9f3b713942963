/**
 * @fileoverview Environment-variable backed configuration provider.
 *
 * Maps `section` + `key` to an upper snake case variable name:
 * `jobweave.cluster` + `pollIntervalSeconds` reads
 * `JOBWEAVE_CLUSTER_POLL_INTERVAL_SECONDS`.
 *
 * @module core/envConfigProvider
 */

import type { IConfigProvider } from '../interfaces/IConfigProvider';
import { Logger } from './logger';

const log = Logger.for('config');

/**
 * Build the environment variable name for a configuration key.
 */
export function toEnvName(section: string, key: string): string {
  return `${section}.${key}`
    .split('.')
    .map(part => part.replace(/([a-z0-9])([A-Z])/g, '$1_$2').replace(/-/g, '_').toUpperCase())
    .join('_');
}

/**
 * Reads configuration from an environment record (defaults to `process.env`).
 * Values that do not parse as the default's type fall back to the default.
 */
export class EnvConfigProvider implements IConfigProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  getConfig(section: string, key: string, defaultValue: string): string;
  getConfig(section: string, key: string, defaultValue: number): number;
  getConfig(section: string, key: string, defaultValue: boolean): boolean;
  getConfig(section: string, key: string, defaultValue: string | number | boolean): string | number | boolean {
    const name = toEnvName(section, key);
    const raw = this.env[name];
    if (raw === undefined || raw.trim() === '') {
      return defaultValue;
    }

    if (typeof defaultValue === 'number') {
      const parsed = Number(raw.trim());
      if (!Number.isFinite(parsed)) {
        log.warn(`Ignoring ${name}=${raw}: not a number`);
        return defaultValue;
      }
      return parsed;
    }

    if (typeof defaultValue === 'boolean') {
      const normalized = raw.trim().toLowerCase();
      if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
      if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
      log.warn(`Ignoring ${name}=${raw}: not a boolean`);
      return defaultValue;
    }

    return raw;
  }
}
