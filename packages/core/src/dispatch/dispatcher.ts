/**
 * SubcommandDispatcher — routes the tail of a token stream to the
 * interpreter of the named subcommand, creating each child interpreter
 * once and reusing it for later parses.
 */

import type { ICommandSpec, IParseResult } from "@argloom/sdk";
import type { Logger } from "@argloom/shared";

export interface SubcommandParser {
  parse(tokens: readonly string[]): IParseResult;
  parseExpanded(tokens: readonly string[]): IParseResult;
}

export interface SubcommandDispatcher {
  /**
   * Parse `tokens` as a fresh run of the subcommand.
   *
   * @param expanded - true when the parent already expanded at-files
   */
  dispatch(name: string, subcommand: ICommandSpec, tokens: readonly string[], expanded: boolean): IParseResult;
  /** Child parsers created so far, keyed by subcommand spec. */
  children(): ReadonlyMap<ICommandSpec, SubcommandParser>;
}

export function createSubcommandDispatcher(
  createParser: (name: string, subcommand: ICommandSpec) => SubcommandParser,
  logger: Logger,
): SubcommandDispatcher {
  const parsers = new Map<ICommandSpec, SubcommandParser>();

  return {
    dispatch(name: string, subcommand: ICommandSpec, tokens: readonly string[], expanded: boolean): IParseResult {
      let parser = parsers.get(subcommand);
      if (!parser) {
        parser = createParser(name, subcommand);
        parsers.set(subcommand, parser);
      }
      logger.debug(`Dispatching ${tokens.length} args to subcommand '${name}'`);
      return expanded ? parser.parseExpanded(tokens) : parser.parse(tokens);
    },

    children(): ReadonlyMap<ICommandSpec, SubcommandParser> {
      return parsers;
    },
  };
}
