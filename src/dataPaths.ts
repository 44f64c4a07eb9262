import path from "node:path";
import { cfg } from "./config/env.js";

/** Absolute path of a file under DATA_ROOT (class tables, presets, default database). */
export function resolveDataFile(fileName: string): string {
  if (path.isAbsolute(fileName) || fileName.includes("..")) {
    throw new Error(`Data file name must be relative to DATA_ROOT: ${fileName}`);
  }
  return path.resolve(cfg.data.root, fileName);
}
