/**
 * File I/O helpers for the fileset directory layout.
 */

import { readFile, stat } from "node:fs/promises";

import { FileReadError, toError } from "@harvestkit/errors";

/** Number of characters to check for null bytes (binary detection) */
const NULL_BYTE_CHECK_SIZE = 8192;

/**
 * Reads a text file, detecting binary content and stripping BOM.
 *
 * @param purpose - what the file is for ("prospector", "pipeline"), used in errors
 * @throws {FileReadError} if the file cannot be read or looks binary
 */
export async function readTextFile(filePath: string, purpose: string): Promise<string> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error: unknown) {
    throw new FileReadError(filePath, purpose, toError(error));
  }

  if (content.slice(0, NULL_BYTE_CHECK_SIZE).includes("\0")) {
    throw new FileReadError(filePath, purpose, new Error("File appears to be binary, not text"));
  }

  return content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
}

/**
 * Checks whether a path points to an existing directory.
 */
export async function directoryExists(dirPath: string): Promise<boolean> {
  try {
    return (await stat(dirPath)).isDirectory();
  } catch {
    return false;
  }
}
