import { existsSync, statSync } from "fs";
import { fileIsDirectory, fileNotFound } from "./errors/catalog.js";

/**
 * Ensure a path names an existing regular file and return its size.
 */
export function assertFile(path: string): number {
  if (!existsSync(path)) {
    throw fileNotFound(path);
  }
  const stats = statSync(path);
  if (stats.isDirectory()) {
    throw fileIsDirectory(path);
  }
  return stats.size;
}

/** Media type of every Publisher upload, whatever the file extension. */
export const UPLOAD_CONTENT_TYPE = "application/octet-stream";

/** 1536 -> "1.5 KB" */
export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${bytes} B` : `${value.toFixed(1)} ${units[unit]}`;
}
