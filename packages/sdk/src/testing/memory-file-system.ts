/**
 * MemoryFileSystem - in-memory FileSystemReader for preprocessor tests.
 *
 * Provides:
 * - Files keyed by absolute POSIX path
 * - Symbolic links (an alias path whose realpath is another file)
 * - Unreadable entries that exist but cannot be read
 * - An access log for asserting which paths were touched
 */

import { posix } from "node:path";
import type { FileSystemReader } from "../interfaces/file-system.js";

export interface MemoryFileSystemOptions {
  /** Initial files: absolute path → contents. */
  files?: Record<string, string>;
  /** Alias path → target path. */
  links?: Record<string, string>;
  /** Paths that exist but are not readable. */
  unreadable?: string[];
}

/**
 * @example
 * ```typescript
 * import { createMemoryFileSystem } from "@argloom/sdk/testing";
 *
 * const fs = createMemoryFileSystem({ files: { "/work/args.txt": "-v\nout.txt\n" } });
 * const expander = createAtFileExpander({ fileSystem: fs, cwd: "/work" });
 * ```
 */
export class MemoryFileSystem implements FileSystemReader {
  private files: Map<string, string> = new Map();
  private links: Map<string, string> = new Map();
  private unreadable: Set<string> = new Set();

  /** Every path passed to any method, in call order. */
  readonly accessed: string[] = [];

  constructor(options: MemoryFileSystemOptions = {}) {
    for (const [path, contents] of Object.entries(options.files ?? {})) {
      this.addFile(path, contents);
    }
    for (const [alias, target] of Object.entries(options.links ?? {})) {
      this.addLink(alias, target);
    }
    for (const path of options.unreadable ?? []) {
      this.unreadable.add(posix.normalize(path));
    }
  }

  addFile(path: string, contents: string): this {
    this.files.set(posix.normalize(path), contents);
    return this;
  }

  addLink(alias: string, target: string): this {
    this.links.set(posix.normalize(alias), posix.normalize(target));
    return this;
  }

  exists(path: string): boolean {
    this.accessed.push(path);
    const resolved = this.resolve(path);
    return this.files.has(resolved) || this.unreadable.has(resolved);
  }

  isReadable(path: string): boolean {
    this.accessed.push(path);
    const resolved = this.resolve(path);
    return this.files.has(resolved) && !this.unreadable.has(resolved);
  }

  realpath(path: string): string {
    this.accessed.push(path);
    return this.resolve(path);
  }

  readText(path: string): string {
    this.accessed.push(path);
    const contents = this.files.get(this.resolve(path));
    if (contents === undefined) {
      throw new Error(`ENOENT: no such file '${path}'`);
    }
    return contents;
  }

  private resolve(path: string): string {
    const normalized = posix.normalize(path);
    return this.links.get(normalized) ?? normalized;
  }
}

export function createMemoryFileSystem(options?: MemoryFileSystemOptions): MemoryFileSystem {
  return new MemoryFileSystem(options);
}
