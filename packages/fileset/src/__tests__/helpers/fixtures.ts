import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";

import type { HostInfoProvider } from "../../types.js";

export const TEST_HOST: HostInfoProvider = {
  hostname: () => "web-01.example.com",
};

export const NGINX_ACCESS_MANIFEST = `module_version: "1.0"

var:
  - name: paths
    default:
      - /var/log/nginx/access.log*
    os.darwin:
      - /usr/local/var/log/nginx/access.log*
  - name: pipeline
    default: default
  - name: tags
    default: ["{{.builtin.hostname}}"]

ingest_pipeline: ingest/{{.pipeline}}.json
prospector: config/nginx-access.yml
`;

export const NGINX_ACCESS_PROSPECTOR = `type: log
paths:
{{ range $i, $path := .paths }}
 - {{$path}}
{{ end }}
exclude_files: [".gz$"]
tags: {{.tags}}
pipeline: {{.beat.pipeline_id}}
fields:
  host: {{.builtin.hostname}}
`;

export const NGINX_ACCESS_PIPELINE = {
  description: "Pipeline for parsing nginx access logs",
  processors: [{ set: { field: "event.created", value: "{{_ingest.timestamp}}" } }],
};

/**
 * Writes `files` (relative path → contents) under
 * `<modulesPath>/<module>/<fileset>/`.
 */
export async function writeFileset(
  modulesPath: string,
  module: string,
  fileset: string,
  files: Readonly<Record<string, string>>,
): Promise<void> {
  for (const [relativePath, contents] of Object.entries(files)) {
    const filePath = join(modulesPath, module, fileset, relativePath);
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, contents, "utf-8");
  }
}

export async function writeNginxAccess(modulesPath: string): Promise<void> {
  await writeFileset(modulesPath, "nginx", "access", {
    "manifest.yml": NGINX_ACCESS_MANIFEST,
    "config/nginx-access.yml": NGINX_ACCESS_PROSPECTOR,
    "ingest/default.json": JSON.stringify(NGINX_ACCESS_PIPELINE, null, 2),
  });
}
