/**
 * @fileoverview Composition root.
 *
 * The one place where concrete classes meet their interfaces. Everything
 * else receives its collaborators through constructors, so tests can build
 * the same graph around fakes.
 *
 * ## Dependency Graph
 *
 * ```
 * IConfigProvider ──→ EnvConfigProvider
 *   └─ used by: JobweaveConfig, Logger
 *
 * IFileSystem     ──→ DefaultFileSystem
 *   └─ used by: JobResultStore, SubprocessBackend, ClusterBackend, ClusterJobWatcher
 *
 * IProcessSpawner ──→ DefaultProcessSpawner
 *   └─ used by: SubprocessBackend, SlurmScheduler
 *
 * IClusterScheduler ──→ SlurmScheduler
 *   └─ used by: ClusterJobWatcher (through ClusterStatusCache)
 *
 * Dispatcher ──→ LocalBackend, SubprocessBackend, ClusterBackend, JobResultStore
 *   └─ used by: FutureRunner, SerialRunner
 * ```
 *
 * @module composition
 */

import { Logger } from './core/logger';
import { JobweaveConfig } from './core/config';
import { EnvConfigProvider } from './core/envConfigProvider';
import { DefaultFileSystem } from './core/defaultFileSystem';
import { ClusterBackend } from './backends/clusterBackend';
import { LocalBackend } from './backends/localBackend';
import { SubprocessBackend } from './backends/subprocessBackend';
import { SlurmScheduler } from './cluster/slurmScheduler';
import { ClusterStatusCache } from './cluster/statusCache';
import { ClusterJobWatcher } from './cluster/watcher';
import type { IClusterScheduler } from './interfaces/IClusterScheduler';
import type { IConfigProvider } from './interfaces/IConfigProvider';
import type { IFileSystem } from './interfaces/IFileSystem';
import type { IProcessSpawner } from './interfaces/IProcessSpawner';
import { DefaultProcessSpawner } from './interfaces/IProcessSpawner';
import { Dispatcher } from './runners/dispatcher';
import { FutureRunner } from './runners/futureRunner';
import { SerialRunner } from './runners/serialRunner';
import { JobResultStore } from './store/jobResultStore';

/** Overrides for {@link createServices}. */
export interface ServiceOverrides {
  config?: IConfigProvider;
  fileSystem?: IFileSystem;
  spawner?: IProcessSpawner;
  clusterScheduler?: IClusterScheduler;
  /** Keep cluster statuses in memory instead of the shared cache file */
  privateStatusCache?: boolean;
}

/** Wired services. */
export interface Services {
  config: JobweaveConfig;
  fileSystem: IFileSystem;
  store: JobResultStore;
  statusCache: ClusterStatusCache;
  watcher: ClusterJobWatcher;
  dispatcher: Dispatcher;
}

/**
 * Wire the production services. Initializes the logger from the same
 * configuration.
 */
export function createServices(overrides: ServiceOverrides = {}): Services {
  const provider = overrides.config ?? new EnvConfigProvider();
  Logger.initialize(provider);

  const config = new JobweaveConfig(provider);
  const cluster = config.cluster;
  const fileSystem = overrides.fileSystem ?? new DefaultFileSystem();
  const spawner = overrides.spawner ?? new DefaultProcessSpawner();
  const store = new JobResultStore(fileSystem);

  const statusCache = new ClusterStatusCache({
    filePath: overrides.privateStatusCache ? undefined : cluster.cacheFile,
    minQueryIntervalMs: cluster.minQueryIntervalMs,
  });
  const scheduler = overrides.clusterScheduler ?? new SlurmScheduler({ spawner, timeoutMs: cluster.commandTimeoutMs });
  const watcher = new ClusterJobWatcher(scheduler, statusCache, {
    pollIntervalMs: cluster.pollIntervalMs,
    pollJitterMs: cluster.pollJitterMs,
    submitMarginMs: cluster.submitMarginMs,
    fileSystem,
  });

  const dispatcher = new Dispatcher(
    {
      local: new LocalBackend(),
      subprocess: new SubprocessBackend({ spawner, fileSystem, store }),
      cluster: new ClusterBackend(watcher, { fileSystem, store }),
    },
    store,
  );

  return { config, fileSystem, store, statusCache, watcher, dispatcher };
}

/** A future runner over freshly wired services. */
export function createFutureRunner(overrides: ServiceOverrides = {}): FutureRunner {
  const services = createServices(overrides);
  return new FutureRunner(services.dispatcher, { config: services.config });
}

/** A serial runner over freshly wired services. */
export function createSerialRunner(overrides: ServiceOverrides = {}): SerialRunner {
  return new SerialRunner(createServices(overrides).dispatcher);
}
