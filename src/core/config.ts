/**
 * @fileoverview jobweave configuration
 *
 * Wraps configuration access behind {@link IConfigProvider} with typed
 * accessors and the documented defaults.
 *
 * @module core/config
 */

import * as os from 'os';
import * as path from 'path';
import type { IConfigProvider } from '../interfaces/IConfigProvider';
import { cpuCountMinusOne } from './utils';

export const CLUSTER_SECTION = 'jobweave.cluster';
export const RUNNER_SECTION = 'jobweave.runner';

/** Default location of the shared cluster status cache. */
export function defaultCacheFile(): string {
  return path.join(os.homedir(), '.cache', 'jobweave', 'cluster-status.json');
}

/**
 * Cluster watcher timing, all in milliseconds.
 */
export interface ClusterSettings {
  /** Cached statuses younger than this are reused */
  minQueryIntervalMs: number;
  /** Lower bound of the sleep between polls */
  pollIntervalMs: number;
  /** Random extra sleep added to each poll */
  pollJitterMs: number;
  /** `unknown` statuses observed this soon after submission are ignored */
  submitMarginMs: number;
  /** Timeout for one scheduler command */
  commandTimeoutMs: number;
  /** Shared status cache file */
  cacheFile: string;
}

/**
 * Provides jobweave configuration with type-safe accessors.
 *
 * Falls back to defaults when no config provider is given.
 */
export class JobweaveConfig {
  constructor(private readonly provider?: IConfigProvider) {}

  private number(section: string, key: string, defaultValue: number): number {
    return this.provider ? this.provider.getConfig(section, key, defaultValue) : defaultValue;
  }

  private string(section: string, key: string, defaultValue: string): string {
    return this.provider ? this.provider.getConfig(section, key, defaultValue) : defaultValue;
  }

  /**
   * Worker pool size for the future runner (at least 1).
   */
  get maxParallel(): number {
    const value = Math.floor(this.number(RUNNER_SECTION, 'maxParallel', cpuCountMinusOne()));
    return Math.max(1, value);
  }

  get cluster(): ClusterSettings {
    const seconds = (key: string, defaultValue: number): number =>
      Math.max(0, this.number(CLUSTER_SECTION, key, defaultValue)) * 1000;

    return {
      minQueryIntervalMs: seconds('minQueryIntervalSeconds', 30),
      pollIntervalMs: seconds('pollIntervalSeconds', 10),
      pollJitterMs: seconds('pollJitterSeconds', 5),
      submitMarginMs: seconds('submitMarginSeconds', 5),
      commandTimeoutMs: seconds('commandTimeoutSeconds', 60),
      cacheFile: expandHome(this.string(CLUSTER_SECTION, 'cacheFile', defaultCacheFile())),
    };
  }
}

/**
 * Expand a leading `~` to the home directory.
 */
export function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}
