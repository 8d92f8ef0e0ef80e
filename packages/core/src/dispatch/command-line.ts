/**
 * CommandLine — entry point that owns the interpreter tree for a command
 * specification. The root interpreter creates one child interpreter per
 * subcommand on first use.
 *
 * @example
 * ```typescript
 * const spec = CommandSpec.builder("greet")
 *   .addOption(OptionSpec.builder("-n", "--name").type("string").binding(name).build())
 *   .build();
 * const result = CommandLine.fromEnvironment(spec).parseArgs("--name", "Ada");
 * ```
 */

import type { ICommandSpec } from "@argloom/sdk";
import { loadProcessConfig } from "@argloom/shared";
import { atFileUsageEntry } from "../atfile/preprocessor.js";
import type { AtFileUsageEntry } from "../atfile/preprocessor.js";
import { createInterpreter } from "../interpreter/interpreter.js";
import type { Interpreter, InterpreterOptions } from "../interpreter/interpreter.js";
import type { ParseResult } from "../interpreter/parse-result.js";

export interface FromEnvironmentOptions extends Omit<InterpreterOptions, "processConfig"> {
  env?: Record<string, string | undefined>;
}

export class CommandLine {
  private readonly interpreter: Interpreter;

  constructor(
    readonly spec: ICommandSpec,
    private readonly options: InterpreterOptions = {},
  ) {
    this.interpreter = createInterpreter(spec, options);
  }

  /** Read process configuration from the environment (process.env by default). */
  static fromEnvironment(spec: ICommandSpec, options: FromEnvironmentOptions = {}): CommandLine {
    const { env, ...rest } = options;
    return new CommandLine(spec, { ...rest, processConfig: loadProcessConfig(env) });
  }

  parseArgs(...args: string[]): ParseResult {
    return this.interpreter.parse(args);
  }

  /** Label and description of the at-file entry for a help layer. */
  atFileUsage(): AtFileUsageEntry {
    return atFileUsageEntry(this.options.processConfig);
  }
}
