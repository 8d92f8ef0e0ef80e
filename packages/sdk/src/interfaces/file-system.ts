/**
 * Read-only file-system capability used by the argument-file preprocessor.
 * All paths are absolute by the time they reach an implementation.
 */
export interface FileSystemReader {
  exists(path: string): boolean;
  isReadable(path: string): boolean;
  /** Canonical identity of a file, used for cycle detection. */
  realpath(path: string): string;
  readText(path: string): string;
}
