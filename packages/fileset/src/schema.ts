/**
 * Zod schemas for manifest.yml and for the module / fileset selection
 * config.
 */

import { z } from "zod";

import { normalizeVariableDeclaration } from "./normalize.js";
import type { FilesetConfig, FilesetManifest, ModuleConfig } from "./types.js";

/**
 * `var` entries are only checked to be mappings here; missing `name` /
 * `default` keys are reported during resolution with the offending index.
 * Dotted `os.<name>` keys are folded into an `os` mapping.
 */
export const VariableDeclarationSchema = z.record(z.unknown()).transform(normalizeVariableDeclaration);

/**
 * manifest.yml. `module_version` is often written unquoted (`1.0`), so
 * numbers are accepted and turned into strings.
 */
export const ManifestSchema = z
  .object({
    module_version: z
      .union([z.string(), z.number()])
      .transform((v) => String(v))
      .default(""),
    var: z.array(VariableDeclarationSchema).nullish().transform((v) => v ?? []),
    ingest_pipeline: z.string().min(1),
    prospector: z.string().min(1),
  })
  .transform(
    (m): FilesetManifest => ({
      moduleVersion: m.module_version,
      vars: m.var,
      ingestPipeline: m.ingest_pipeline,
      prospector: m.prospector,
    }),
  );

export const FilesetConfigSchema = z.object({
  enabled: z.boolean().default(true),
  var: z.record(z.unknown()).default({}),
  prospector: z.record(z.unknown()).default({}),
});

export const ModuleConfigSchema = z.object({
  module: z.string().min(1),
  enabled: z.boolean().default(true),
  filesets: z.record(FilesetConfigSchema).default({}),
});

/**
 * Compile-time assertion: the parsed configs are usable wherever the
 * hand-written config interfaces are expected.
 */
type _FilesetCheck = z.output<typeof FilesetConfigSchema> extends FilesetConfig ? true : never;
type _ModuleCheck = z.output<typeof ModuleConfigSchema> extends ModuleConfig ? true : never;
const _assertConfigs: _FilesetCheck & _ModuleCheck = true;
void _assertConfigs;
