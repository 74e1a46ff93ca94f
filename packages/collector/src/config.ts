/**
 * Collector configuration: defaults and normalization.
 */

// ============================================================================
// Configuration Types
// ============================================================================

/**
 * Options that shape the extracted records.
 */
export interface CollectorConfig {
  /**
   * Characters trimmed from both ends of every provenance path.
   *
   * The value is used as a character set, not as a prefix: any leading or
   * trailing character that appears anywhere in it is removed.
   * Default: `../chromium/src/third_party/WebKit`
   */
  readonly stripPrefix?: string;

  /**
   * Directory provenance paths are made relative to.
   * Default: `process.cwd()` at the time the config is resolved.
   */
  readonly cwd?: string;
}

/**
 * Options for discovering documents on disk.
 */
export interface DiscoveryConfig {
  /** File name suffix of interface-definition documents. Default: `.idl` */
  readonly extension?: string;

  /** Base file names that are never collected. Default: `["InspectorInstrumentation.idl"]` */
  readonly exclude?: readonly string[];
}

export interface ResolvedCollectorConfig {
  readonly stripPrefix: string;
  readonly cwd: string;
}

export interface ResolvedDiscoveryConfig {
  readonly extension: string;
  readonly exclude: ReadonlySet<string>;
}

// ============================================================================
// Default Values
// ============================================================================

export const DEFAULT_STRIP_PREFIX = "../chromium/src/third_party/WebKit";

export const DEFAULT_EXTENSION = ".idl";

export const DEFAULT_EXCLUDED_DOCUMENTS: readonly string[] = ["InspectorInstrumentation.idl"];

// ============================================================================
// Normalization
// ============================================================================

export function resolveCollectorConfig(config?: CollectorConfig): ResolvedCollectorConfig {
  return {
    stripPrefix: config?.stripPrefix ?? DEFAULT_STRIP_PREFIX,
    cwd: config?.cwd ?? process.cwd(),
  };
}

export function resolveDiscoveryConfig(config?: DiscoveryConfig): ResolvedDiscoveryConfig {
  return {
    extension: config?.extension ?? DEFAULT_EXTENSION,
    exclude: new Set(config?.exclude ?? DEFAULT_EXCLUDED_DOCUMENTS),
  };
}
