import { basename, sep } from "node:path";

/**
 * Returns the file name without its extension: everything from the last
 * `.` of the final path segment is dropped. Without a dot, the input is
 * returned unchanged. Only `/` and the platform separator end a segment.
 */
export function removeExt(path: string): string {
  const lastSeparator = Math.max(path.lastIndexOf("/"), path.lastIndexOf(sep));
  const dot = path.lastIndexOf(".");
  return dot > lastSeparator ? path.slice(0, dot) : path;
}

/**
 * ID under which a fileset's ingest pipeline is registered:
 * `<module>-<fileset>-<pipeline file name without extension>`.
 */
export function formatPipelineID(module: string, fileset: string, path: string): string {
  return `${module}-${fileset}-${removeExt(basename(path))}`;
}
