/**
 * @fileoverview Interface for configuration access abstraction.
 *
 * Decouples components from where settings come from (environment
 * variables in production, an in-memory map in tests).
 *
 * @module interfaces/IConfigProvider
 */

/**
 * Interface for reading configuration values.
 *
 * The type of the default decides how the raw setting is parsed.
 *
 * @example
 * ```typescript
 * class ClusterSettingsReader {
 *   constructor(private readonly config: IConfigProvider) {}
 *
 *   pollIntervalSeconds(): number {
 *     return this.config.getConfig('jobweave.cluster', 'pollIntervalSeconds', 10);
 *   }
 * }
 * ```
 */
export interface IConfigProvider {
  /**
   * Get a configuration value with a fallback default.
   *
   * @param section - Configuration section, e.g. `jobweave.cluster`
   * @param key - Configuration key within the section
   * @param defaultValue - Value returned when the setting is absent or unparsable
   */
  getConfig(section: string, key: string, defaultValue: string): string;
  getConfig(section: string, key: string, defaultValue: number): number;
  getConfig(section: string, key: string, defaultValue: boolean): boolean;
}
