/**
 * Module-level loading: validates a module config and reads every enabled
 * fileset it selects.
 */

import { FilesetConfigError } from "@harvestkit/errors";

import { Fileset, type FilesetOptions } from "./fileset.js";
import { ModuleConfigSchema } from "./schema.js";
import type { ModuleConfig } from "./types.js";

/**
 * Validates a raw module config (e.g. parsed from YAML) and fills in
 * defaults: `enabled: true`, empty `filesets`, empty `var` / `prospector`.
 *
 * @throws {FilesetConfigError} listing every schema problem
 */
export function parseModuleConfig(raw: unknown): ModuleConfig {
  const result = ModuleConfigSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message,
    );
    throw new FilesetConfigError(problems, result.error);
  }
  return result.data;
}

/**
 * Creates and reads each enabled fileset of an enabled module, in fileset
 * name order. The first failure is thrown; whether that aborts the whole
 * run is the caller's decision.
 */
export async function loadModule(
  modulesPath: string,
  moduleConfig: ModuleConfig,
  options: FilesetOptions = {},
): Promise<Fileset[]> {
  if (moduleConfig.enabled === false) {
    options.onDebug?.(`[fileset] Module ${moduleConfig.module} is disabled, skipping`);
    return [];
  }

  const filesets: Fileset[] = [];
  const entries = Object.entries(moduleConfig.filesets ?? {}).sort(([a], [b]) => a.localeCompare(b));
  for (const [name, filesetConfig] of entries) {
    if (filesetConfig.enabled === false) {
      options.onDebug?.(`[fileset] Fileset ${moduleConfig.module}/${name} is disabled, skipping`);
      continue;
    }
    const fileset = await Fileset.create(modulesPath, name, moduleConfig, filesetConfig, options);
    await fileset.read();
    filesets.push(fileset);
  }
  return filesets;
}
