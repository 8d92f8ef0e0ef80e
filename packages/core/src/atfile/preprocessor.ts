/**
 * Argument-file expansion.
 *
 * A token "@path" naming a readable file is replaced in place by the tokens
 * in that file, recursively. "@@x" unescapes to the literal "@x". Missing or
 * unreadable files, and files already open further up the inclusion chain,
 * leave the token as it is; these cases are logged, never raised.
 */

import { resolve } from "node:path";
import type { FileSystemReader } from "@argloom/sdk";
import { createLogger } from "@argloom/shared";
import type { Logger, ProcessConfig } from "@argloom/shared";
import { createNodeFileSystem } from "./node-file-system.js";
import { tokenizeClassic, tokenizeSimplified } from "./tokenizer.js";

export interface AtFileExpanderOptions {
  fileSystem?: FileSystemReader;
  /** Directory relative paths resolve against. Defaults to process.cwd(). */
  cwd?: string;
  /** Defaults to "#"; null disables comments. */
  commentChar?: string | null;
  simplified?: boolean;
  logger?: Logger;
}

export interface AtFileExpander {
  expand(tokens: readonly string[]): string[];
}

export function createAtFileExpander(options: AtFileExpanderOptions = {}): AtFileExpander {
  const fileSystem = options.fileSystem ?? createNodeFileSystem();
  const cwd = options.cwd ?? process.cwd();
  const commentChar = options.commentChar === undefined ? "#" : options.commentChar;
  const tokenize = options.simplified ? tokenizeSimplified : tokenizeClassic;
  const logger = options.logger ?? createLogger("AtFile", "warn");

  function expandInto(tokens: readonly string[], chain: Set<string>, out: string[]): void {
    for (const token of tokens) {
      if (token.length < 2 || !token.startsWith("@")) {
        out.push(token);
        continue;
      }
      if (token.startsWith("@@")) {
        logger.info(`Not expanding @-escaped argument ${token} (trimmed leading '@' char)`);
        out.push(token.slice(1));
        continue;
      }

      const path = resolve(cwd, token.slice(1));
      if (!fileSystem.exists(path) || !fileSystem.isReadable(path)) {
        logger.info(`File ${path} does not exist or cannot be read; treating argument literally`);
        out.push(token);
        continue;
      }
      const identity = fileSystem.realpath(path);
      if (chain.has(identity)) {
        logger.info(`Already visited file ${identity}; ignoring...`);
        out.push(token);
        continue;
      }

      let text: string;
      try {
        text = fileSystem.readText(path);
      } catch (err) {
        logger.info(`Could not read file ${path}; treating argument literally`, {
          error: err instanceof Error ? err.message : String(err),
        });
        out.push(token);
        continue;
      }

      const fileTokens = tokenize(text, commentChar);
      logger.debug(`Expanding argument file ${path}`, { tokens: fileTokens.length });
      chain.add(identity);
      expandInto(fileTokens, chain, out);
      chain.delete(identity);
    }
  }

  return {
    expand(tokens: readonly string[]): string[] {
      const out: string[] = [];
      expandInto(tokens, new Set(), out);
      return out;
    },
  };
}

export interface AtFileUsageEntry {
  label: string;
  description: string;
}

export const DEFAULT_AT_FILE_LABEL = "@<filename>";
export const DEFAULT_AT_FILE_DESCRIPTION = "One or more argument files containing options.";

/** Label and description a help layer shows for the at-file argument. */
export function atFileUsageEntry(config: ProcessConfig = {}): AtFileUsageEntry {
  return {
    label: config.atFileLabel ?? DEFAULT_AT_FILE_LABEL,
    description: config.atFileDescription ?? DEFAULT_AT_FILE_DESCRIPTION,
  };
}
