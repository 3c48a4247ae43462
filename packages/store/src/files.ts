/**
 * @flatchain/store — Scoped file writers.
 *
 * Every write opens its own descriptor, fsyncs and closes it before
 * returning. No handle outlives the call that opened it.
 */

import {
  appendFileSync,
  closeSync,
  existsSync,
  fsyncSync,
  openSync,
  readFileSync,
  renameSync,
  writeFileSync,
} from "node:fs";

/**
 * Append data and fsync.
 */
export function appendAndSync(path: string, data: string): void {
  const fd = openSync(path, "a");
  try {
    appendFileSync(fd, data, "utf-8");
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
}

/**
 * Replace a file's contents: write a sibling temp file, fsync it, then
 * rename it over the target. Readers see the old or the new file,
 * never a mix.
 */
export function replaceAndSync(path: string, data: string): void {
  const tmp = `${path}.tmp`;
  const fd = openSync(tmp, "w");
  try {
    writeFileSync(fd, data, "utf-8");
    fsyncSync(fd);
  } finally {
    closeSync(fd);
  }
  renameSync(tmp, path);
}

/**
 * Join records as newline-terminated lines ("" for none).
 */
export function toLines(records: readonly string[]): string {
  return records.map((r) => `${r}\n`).join("");
}

/**
 * Read a file as lines, without the trailing newline's empty entry.
 * Returns undefined if the file does not exist.
 */
export function readLines(path: string): string[] | undefined {
  if (!existsSync(path)) return undefined;
  const content = readFileSync(path, "utf-8");
  if (content.length === 0) return [];
  const lines = content.split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}
