/**
 * FileSystemReader backed by node:fs.
 */

import { accessSync, constants, existsSync, readFileSync, realpathSync, statSync } from "node:fs";
import type { FileSystemReader } from "@argloom/sdk";

export function createNodeFileSystem(): FileSystemReader {
  return {
    exists: (path) => existsSync(path),

    isReadable(path: string): boolean {
      try {
        accessSync(path, constants.R_OK);
        return statSync(path).isFile();
      } catch {
        return false;
      }
    },

    realpath: (path) => realpathSync(path),

    readText: (path) => readFileSync(path, "utf8"),
  };
}
