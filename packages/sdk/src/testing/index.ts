/**
 * Testing utilities for code built on argloom.
 * Import via: import { createMemoryFileSystem } from "@argloom/sdk/testing";
 */

export { MemoryFileSystem, createMemoryFileSystem } from "./memory-file-system.js";
export type { MemoryFileSystemOptions } from "./memory-file-system.js";
