/**
 * A single fileset of a module: its manifest, resolved variables, and the
 * harvesting config and ingest pipeline they materialize.
 */

import { join } from "node:path";

import {
  ConfigParseError,
  FilesetNotReadError,
  MissingModuleError,
  TemplateError,
  toError,
} from "@harvestkit/errors";
import { getFilesetLoads, withSpan } from "@harvestkit/telemetry";
import { parse as parseYaml, YAMLParseError } from "yaml";

import { currentOsName, osHostInfo } from "./builtin.js";
import { deepFreeze } from "./freeze.js";
import { directoryExists, readTextFile } from "./fs-utils.js";
import { loadManifest } from "./loader.js";
import { mergeConfigs } from "./merge.js";
import { formatPipelineID } from "./pipeline-id.js";
import { resolveVariables } from "./resolver.js";
import { applyTemplate } from "./template.js";
import type {
  ConfigObject,
  FilesetConfig,
  FilesetManifest,
  HostInfoProvider,
  IngestPipeline,
  ModuleConfig,
  VariableEnvironment,
} from "./types.js";
import { cloneValue, isMapping } from "./values.js";

export interface FilesetOptions {
  /** OS identifier matched against manifest `os:` keys (default: current OS) */
  readonly osName?: string;
  /** Source of the `builtin.hostname` / `builtin.domain` variables */
  readonly hostInfo?: HostInfoProvider;
  /** Receives debug-level log lines */
  readonly onDebug?: (message: string) => void;
}

interface ReadState {
  readonly manifest: FilesetManifest;
  readonly vars: VariableEnvironment;
}

export class Fileset {
  private state: ReadState | undefined;

  private constructor(
    readonly name: string,
    readonly moduleConfig: ModuleConfig,
    readonly filesetConfig: FilesetConfig,
    readonly modulePath: string,
    private readonly options: FilesetOptions,
  ) {}

  /**
   * @param modulesPath - directory containing one sub-directory per module
   * @throws {MissingModuleError} if `<modulesPath>/<module>` is not a directory
   */
  static async create(
    modulesPath: string,
    name: string,
    moduleConfig: ModuleConfig,
    filesetConfig: FilesetConfig = {},
    options: FilesetOptions = {},
  ): Promise<Fileset> {
    const modulePath = join(modulesPath, moduleConfig.module);
    if (!(await directoryExists(modulePath))) {
      throw new MissingModuleError(moduleConfig.module, modulePath);
    }
    return new Fileset(name, moduleConfig, filesetConfig, modulePath, options);
  }

  get moduleName(): string {
    return this.moduleConfig.module;
  }

  /** Directory holding manifest.yml and the files it references */
  get filesetPath(): string {
    return join(this.modulePath, this.name);
  }

  get manifest(): FilesetManifest {
    return this.requireRead("manifest").manifest;
  }

  /** Resolved variables, including `builtin` and `beat.pipeline_id`. Frozen. */
  get vars(): VariableEnvironment {
    return this.requireRead("vars").vars;
  }

  /**
   * Loads the manifest and resolves its variables. Must complete before
   * any other accessor is used.
   */
  async read(): Promise<void> {
    const attributes = { "fileset.module": this.moduleName, "fileset.name": this.name };
    try {
      await withSpan("harvestkit.fileset.read", attributes, async () => {
        const manifest = await loadManifest(this.filesetPath);
        const resolved = resolveVariables(
          manifest.vars,
          this.options.osName ?? currentOsName(),
          this.filesetConfig.var ?? {},
          this.options.hostInfo ?? osHostInfo,
        );
        const pipelineId = this.pipelineIdFor(manifest, resolved);
        // copied before freezing so caller-supplied overrides stay mutable
        const vars = Object.fromEntries(
          Object.entries({ ...resolved, beat: { pipeline_id: pipelineId } }).map(([k, v]) => [
            k,
            cloneValue(v),
          ]),
        );
        this.state = { manifest, vars: deepFreeze(vars) };
      });
    } catch (error: unknown) {
      getFilesetLoads().add(1, { ...attributes, outcome: "error" });
      throw error;
    }
    getFilesetLoads().add(1, { ...attributes, outcome: "ok" });
  }

  /**
   * ID of the ingest pipeline, derived from the expanded pipeline path.
   */
  getPipelineID(): string {
    const { manifest, vars } = this.requireRead("getPipelineID");
    return this.pipelineIdFor(manifest, vars);
  }

  /**
   * The harvesting config: the prospector template file expanded with the
   * fileset variables, parsed as YAML, with the fileset's `prospector`
   * overrides merged on top. Re-read from disk on every call.
   */
  async getProspectorConfig(): Promise<ConfigObject> {
    const { manifest, vars } = this.requireRead("getProspectorConfig");
    const filePath = this.expandPath(manifest.prospector, vars, "prospector");
    const contents = await readTextFile(filePath, "prospector");

    let yaml: string;
    try {
      yaml = applyTemplate(vars, contents);
    } catch (error: unknown) {
      throw this.withFile(error, filePath);
    }

    const config = parseConfigYaml(yaml, filePath);
    const overrides = this.filesetConfig.prospector ?? {};
    const merged = Object.keys(overrides).length > 0 ? mergeConfigs(config, overrides) : config;

    this.debug(`Merged prospector config for fileset ${this.moduleName}/${this.name}`);
    return merged;
  }

  /**
   * The ingest pipeline definition. The JSON body is not templated, since
   * pipeline processors carry their own `{{ }}` placeholders.
   */
  async getPipeline(): Promise<IngestPipeline> {
    const { manifest, vars } = this.requireRead("getPipeline");
    const path = this.expandTemplate(manifest.ingestPipeline, vars, "ingest pipeline path");
    const filePath = join(this.filesetPath, path);
    const contents = await readTextFile(filePath, "pipeline");

    let content: unknown;
    try {
      content = JSON.parse(contents);
    } catch (error: unknown) {
      throw new ConfigParseError(filePath, "json", toError(error).message, undefined, undefined, toError(error));
    }
    if (!isMapping(content)) {
      throw new ConfigParseError(filePath, "json", "pipeline definition must be a JSON object");
    }

    return {
      pipelineId: formatPipelineID(this.moduleName, this.name, path),
      content: { ...content },
    };
  }

  private pipelineIdFor(manifest: FilesetManifest, vars: VariableEnvironment): string {
    const path = this.expandTemplate(manifest.ingestPipeline, vars, "ingest pipeline path");
    return formatPipelineID(this.moduleName, this.name, path);
  }

  private expandPath(template: string, vars: VariableEnvironment, what: string): string {
    return join(this.filesetPath, this.expandTemplate(template, vars, `${what} path`));
  }

  private expandTemplate(template: string, vars: VariableEnvironment, what: string): string {
    try {
      return applyTemplate(vars, template);
    } catch (error: unknown) {
      if (error instanceof TemplateError) {
        throw new TemplateError(template, `expanding the ${what}: ${error.reason}`, { cause: error });
      }
      throw error;
    }
  }

  private withFile(error: unknown, filePath: string): unknown {
    if (error instanceof TemplateError) {
      return new TemplateError(error.template, error.reason, { filePath, cause: error });
    }
    return error;
  }

  private requireRead(operation: string): ReadState {
    if (this.state === undefined) {
      throw new FilesetNotReadError(this.name, operation);
    }
    return this.state;
  }

  private debug(message: string): void {
    this.options.onDebug?.(`[fileset] ${message}`);
  }
}

/**
 * Parses an expanded harvesting config. An empty document is an empty
 * config; anything other than a mapping is rejected.
 */
function parseConfigYaml(yaml: string, filePath: string): ConfigObject {
  let parsed: unknown;
  try {
    parsed = parseYaml(yaml);
  } catch (error: unknown) {
    if (error instanceof YAMLParseError) {
      const pos = error.linePos?.[0];
      throw new ConfigParseError(filePath, "yaml", error.message, pos?.line, pos?.col, error);
    }
    throw new ConfigParseError(filePath, "yaml", String(error), undefined, undefined, toError(error));
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isMapping(parsed)) {
    throw new ConfigParseError(filePath, "yaml", "harvesting config must be a mapping");
  }
  return { ...parsed };
}
