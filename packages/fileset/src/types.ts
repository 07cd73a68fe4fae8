/**
 * Domain types for fileset loading.
 */

// ============================================================================
// MANIFEST
// ============================================================================

/**
 * A raw `var` entry from manifest.yml. Only `name` and `default` are
 * required, and that is checked during resolution rather than at parse
 * time so the error can name the offending declaration.
 */
export type VariableDeclaration = Readonly<Record<string, unknown>>;

/**
 * Parsed and frozen manifest.yml of a fileset.
 */
export interface FilesetManifest {
  readonly moduleVersion: string;
  /** Declarations in manifest order, which is also resolution order */
  readonly vars: readonly VariableDeclaration[];
  /** Path template of the ingest pipeline JSON, relative to the fileset dir */
  readonly ingestPipeline: string;
  /** Path template of the harvesting config, relative to the fileset dir */
  readonly prospector: string;
}

// ============================================================================
// VARIABLES
// ============================================================================

/**
 * Shape of a variable value before resolution. Strings are templates,
 * sequences have their string elements templated, anything else is
 * passed through untouched.
 */
export type VarValue =
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "sequence"; readonly items: readonly unknown[] }
  | { readonly kind: "opaque"; readonly value: unknown };

/**
 * Flat map of resolved variables, used as the template context.
 * Always contains `builtin`; `beat` is added once the fileset is read.
 */
export type VariableEnvironment = Readonly<Record<string, unknown>>;

export interface BuiltinVars {
  readonly hostname: string;
  readonly domain: string;
}

/**
 * Source of host facts. Injected so resolution is deterministic in tests.
 */
export interface HostInfoProvider {
  /** Fully-qualified host name, e.g. "web-01.example.com" */
  hostname(): string;
}

// ============================================================================
// CONFIGURATION
// ============================================================================

/** Per-fileset selection config */
export interface FilesetConfig {
  readonly enabled?: boolean;
  /** Variable overrides, applied verbatim after manifest resolution */
  readonly var?: Readonly<Record<string, unknown>>;
  /** Override document deep-merged over the harvesting config */
  readonly prospector?: Readonly<Record<string, unknown>>;
}

/** Module selection config */
export interface ModuleConfig {
  readonly module: string;
  readonly enabled?: boolean;
  readonly filesets?: Readonly<Record<string, FilesetConfig>>;
}

// ============================================================================
// OUTPUTS
// ============================================================================

export type ConfigObject = Record<string, unknown>;

export interface IngestPipeline {
  readonly pipelineId: string;
  readonly content: ConfigObject;
}
