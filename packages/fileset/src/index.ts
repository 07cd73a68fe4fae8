/**
 * @harvestkit/fileset
 *
 * Loads filesets (manifest.yml + templated harvesting config + ingest
 * pipeline) from a modules directory and resolves their variables.
 */

// ============================================================================
// PRIMARY API
// ============================================================================

export { Fileset, type FilesetOptions } from "./fileset.js";
export { loadModule, parseModuleConfig } from "./module.js";
export { loadManifest, MANIFEST_FILENAME, parseManifestYaml } from "./loader.js";

// ============================================================================
// VARIABLES
// ============================================================================

export { currentOsName, getBuiltinVars, osHostInfo } from "./builtin.js";
export { classifyValue, resolveVariable, resolveVariables } from "./resolver.js";

// ============================================================================
// TEMPLATES
// ============================================================================

export { applyTemplate, executeTemplate, formatValue, isTruthy } from "./template.js";
export { type Operand, type ParsedTemplate, parseTemplate, type TemplateNode } from "./template-parser.js";

// ============================================================================
// MATERIALIZATION
// ============================================================================

export { mergeConfigs } from "./merge.js";
export { formatPipelineID, removeExt } from "./pipeline-id.js";

// ============================================================================
// SCHEMA & TYPES
// ============================================================================

export {
  FilesetConfigSchema,
  ManifestSchema,
  ModuleConfigSchema,
  VariableDeclarationSchema,
} from "./schema.js";
export type {
  BuiltinVars,
  ConfigObject,
  FilesetConfig,
  FilesetManifest,
  HostInfoProvider,
  IngestPipeline,
  ModuleConfig,
  VarValue,
  VariableDeclaration,
  VariableEnvironment,
} from "./types.js";

// ============================================================================
// UTILITIES
// ============================================================================

export { deepFreeze } from "./freeze.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@harvestkit/fileset";
export const PACKAGE_VERSION = "0.1.0";
