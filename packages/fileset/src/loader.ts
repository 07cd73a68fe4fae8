/**
 * Manifest loader: reads `<fileset dir>/manifest.yml`, parses the YAML,
 * validates it with Zod and deep-freezes the result.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";

import { ManifestReadError, ManifestUnpackError, toError } from "@harvestkit/errors";
import { parse as parseYaml, YAMLParseError } from "yaml";

import { deepFreeze } from "./freeze.js";
import { ManifestSchema } from "./schema.js";
import type { FilesetManifest } from "./types.js";

export const MANIFEST_FILENAME = "manifest.yml";

/**
 * Parses manifest YAML into a validated, frozen FilesetManifest.
 *
 * @param filePath - used only for error messages
 * @throws {ManifestUnpackError} on invalid YAML or a schema mismatch
 */
export function parseManifestYaml(yamlString: string, filePath: string): FilesetManifest {
  let parsed: unknown;
  try {
    parsed = parseYaml(yamlString);
  } catch (error: unknown) {
    if (error instanceof YAMLParseError) {
      const pos = error.linePos?.[0];
      const location = pos ? `line ${pos.line}:${pos.col}: ` : "";
      throw new ManifestUnpackError(filePath, [`${location}${error.message}`], error);
    }
    throw new ManifestUnpackError(filePath, [String(error)], toError(error));
  }

  const result = ManifestSchema.safeParse(parsed);
  if (!result.success) {
    const problems = result.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message,
    );
    throw new ManifestUnpackError(filePath, problems, result.error);
  }

  return deepFreeze(result.data);
}

/**
 * Reads and parses the manifest of the fileset rooted at `filesetPath`.
 *
 * @throws {ManifestReadError} if manifest.yml cannot be read
 * @throws {ManifestUnpackError} if it cannot be parsed or validated
 */
export async function loadManifest(filesetPath: string): Promise<FilesetManifest> {
  const filePath = join(filesetPath, MANIFEST_FILENAME);

  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error: unknown) {
    throw new ManifestReadError(filePath, toError(error));
  }

  return parseManifestYaml(content, filePath);
}
