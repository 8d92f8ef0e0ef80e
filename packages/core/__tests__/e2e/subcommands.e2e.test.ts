/**
 * E2E: Subcommand dispatch and mixins.
 *
 * Verifies that:
 * 1. The tail after a subcommand name is parsed by that subcommand
 * 2. Results chain from the root level down
 * 3. At-files are expanded once, at the root
 * 4. Mixins contribute options, subcommands and usage attributes
 */

import { describe, it, expect } from "vitest";
import { MissingParameterError, TypeConversionError } from "@argloom/sdk";
import { createMemoryFileSystem } from "@argloom/sdk/testing";
import type { LogLevel } from "@argloom/shared";
import {
  CommandLine,
  CommandSpec,
  OptionSpec,
  PositionalParamSpec,
  createInterpreter,
  propertyBinding,
  valueBinding,
} from "../../src/index.js";

function gitLike() {
  const bound = {
    verbose: valueBinding(false),
    message: valueBinding<string | undefined>(undefined),
    amend: valueBinding(false),
    remote: valueBinding<string | undefined>(undefined),
    url: valueBinding<string | undefined>(undefined),
    paths: valueBinding<string[]>([]),
  };
  const commit = CommandSpec.builder("commit")
    .aliases("ci")
    .addOption(OptionSpec.builder("-m", "--message").type("string").binding(bound.message).build())
    .addOption(OptionSpec.builder("--amend").binding(bound.amend).build())
    .build();
  const add = CommandSpec.builder("add")
    .addPositional(PositionalParamSpec.builder().index("0").paramLabel("<name>").binding(bound.remote).build())
    .addPositional(PositionalParamSpec.builder().index("1").paramLabel("<url>").binding(bound.url).build())
    .build();
  const remote = CommandSpec.builder("remote").addSubcommand("add", add).build();
  const git = CommandSpec.builder("git")
    .addOption(OptionSpec.builder("-v", "--verbose").binding(bound.verbose).build())
    .addPositional(PositionalParamSpec.builder().list().binding(bound.paths).build())
    .addSubcommand("commit", commit)
    .addSubcommand("remote", remote)
    .build();
  return { git, commit, remote, add, bound };
}

describe("E2E: subcommand dispatch", () => {
  it("parses the tail with the subcommand's spec", () => {
    const { git, commit, bound } = gitLike();
    const result = createInterpreter(git).parse(["-v", "commit", "-m", "first", "--amend"]);

    expect(bound.verbose.get()).toBe(true);
    expect(bound.message.get()).toBe("first");
    expect(bound.amend.get()).toBe(true);
    expect(result.matchedOptions.map((option) => option.longestName)).toEqual(["--verbose"]);
    expect(result.subcommand?.commandSpec).toBe(commit);
    expect(result.subcommand?.originalArgs).toEqual(["-m", "first", "--amend"]);
    expect(result.asList().map((level) => level.commandSpec.name)).toEqual(["git", "commit"]);
  });

  it("dispatches through aliases", () => {
    const { git, commit } = gitLike();
    expect(createInterpreter(git).parse(["ci"]).subcommand?.commandSpec).toBe(commit);
  });

  it("chains nested levels", () => {
    const { git, bound } = gitLike();
    const result = createInterpreter(git).parse(["remote", "add", "origin", "https://example.test/repo"]);
    expect(result.asList().map((level) => level.commandSpec.name)).toEqual(["git", "remote", "add"]);
    expect(bound.remote.get()).toBe("origin");
    expect(bound.url.get()).toBe("https://example.test/repo");
    expect(result.subcommand?.subcommand?.hasMatchedPositional(1)).toBe(true);
  });

  it("does not let an open-ended option swallow a subcommand name", () => {
    const files = valueBinding<string[]>([]);
    const child = CommandSpec.builder("run").build();
    const spec = CommandSpec.builder("tool")
      .addOption(OptionSpec.builder("-f").list().arity("0..*").binding(files).build())
      .addSubcommand("run", child)
      .build();
    const result = createInterpreter(spec).parse(["-f", "a", "b", "run"]);
    expect(files.get()).toEqual(["a", "b"]);
    expect(result.subcommand?.commandSpec).toBe(child);
  });

  it("treats a subcommand name after '--' as a positional", () => {
    const { git, bound } = gitLike();
    const result = createInterpreter(git).parse(["--", "commit"]);
    expect(result.subcommand).toBeUndefined();
    expect(bound.paths.get()).toEqual(["commit"]);
  });

  it("matches subcommand names ignoring case when configured", () => {
    const child = CommandSpec.builder("status").build();
    const spec = CommandSpec.builder("tool")
      .parser({ subcommandsCaseInsensitive: true })
      .addSubcommand("status", child)
      .build();
    expect(createInterpreter(spec).parse(["STATUS"]).subcommand?.commandSpec).toBe(child);
  });

  it("validates the parent level before dispatching", () => {
    const message = valueBinding<string | undefined>("untouched");
    const child = CommandSpec.builder("commit")
      .addOption(OptionSpec.builder("-m").type("string").binding(message).build())
      .build();
    const spec = CommandSpec.builder("tool")
      .addOption(OptionSpec.builder("--token").type("string").required().build())
      .addSubcommand("commit", child)
      .build();
    const run = () => createInterpreter(spec).parse(["commit", "-m", "x"]);
    expect(run).toThrow(MissingParameterError);
    expect(run).toThrow("Missing required option: '--token=<token>'");
    expect(message.get()).toBe("untouched");
  });

  it("reports a subcommand's error with the subcommand's name", () => {
    const child = CommandSpec.builder("scale")
      .addOption(OptionSpec.builder("--replicas").type("integer").build())
      .build();
    const spec = CommandSpec.builder("tool").addSubcommand("scale", child).build();
    let caught: unknown;
    try {
      createInterpreter(spec).parse(["scale", "--replicas", "many"]);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(TypeConversionError);
    expect(caught instanceof TypeConversionError && caught.commandName).toBe("scale");
  });

  it("collects errors in the subcommand's own result", () => {
    const child = CommandSpec.builder("scale")
      .parser({ collectErrors: true })
      .addOption(OptionSpec.builder("--replicas").type("integer").build())
      .build();
    const spec = CommandSpec.builder("tool").addSubcommand("scale", child).build();
    const result = createInterpreter(spec).parse(["scale", "--replicas", "many"]);
    expect(result.errors).toEqual([]);
    expect(result.subcommand?.errors.map((error) => error.message)).toEqual([
      "Invalid value for option '--replicas' (<replicas>): 'many' is not an integer",
    ]);
  });

  it("expands at-files once, at the root", () => {
    const fileSystem = createMemoryFileSystem({
      files: { "/work/commit-args": "commit -m @@note\n", "/work/note": "expanded twice\n" },
    });
    const { git, bound } = gitLike();
    const result = createInterpreter(git, { fileSystem, cwd: "/work" }).parse(["@commit-args"]);
    expect(result.expandedArgs).toEqual(["commit", "-m", "@note"]);
    expect(result.subcommand?.expandedArgs).toEqual(["-m", "@note"]);
    expect(bound.message.get()).toBe("@note");
  });

  it("logs dispatch through a child logger named after the subcommand", () => {
    const lines: string[] = [];
    const sink = (line: string, _level: LogLevel) => {
      lines.push(line.replace(/^\[[^\]]+\] /, ""));
    };
    const { git } = gitLike();
    createInterpreter(git, { logSink: sink, processConfig: { traceLevel: "DEBUG" } }).parse(["commit", "--amend"]);
    expect(lines).toContain("[DEBUG] [Interpreter] Dispatching 1 args to subcommand 'commit'");
    expect(lines).toContain("[DEBUG] [Interpreter:commit] Found option '--amend'");
  });

  it("reuses child interpreters across parses without leaking values", () => {
    const { git, bound } = gitLike();
    const line = new CommandLine(git);
    line.parseArgs("commit", "-m", "one");
    expect(bound.message.get()).toBe("one");
    line.parseArgs("commit");
    expect(bound.message.get()).toBeUndefined();
  });
});

describe("E2E: mixins", () => {
  interface LoggingOptions {
    level: string;
    quiet: boolean;
  }

  function withLogging(target: LoggingOptions) {
    const help = CommandSpec.builder("help").build();
    return CommandSpec.builder("logging")
      .version("2.1.0")
      .description("Logging switches")
      .addOption(
        OptionSpec.builder("--log-level")
          .type("enum")
          .enumValues("ERROR", "INFO", "DEBUG")
          .defaultValue("INFO")
          .binding(propertyBinding(target, "level"))
          .build(),
      )
      .addOption(OptionSpec.builder("-q", "--quiet").binding(propertyBinding(target, "quiet")).build())
      .addSubcommand("help", help)
      .build();
  }

  it("merges mixin options, subcommands and usage attributes", () => {
    const target: LoggingOptions = { level: "", quiet: false };
    const name = valueBinding<string | undefined>(undefined);
    const spec = CommandSpec.builder("serve")
      .description("Start the server")
      .addOption(OptionSpec.builder("--name").type("string").binding(name).build())
      .addMixin("logging", withLogging(target))
      .build();

    expect(spec.optionNames).toEqual(["--name", "--log-level", "-q", "--quiet"]);
    expect(spec.usage.version).toBe("2.1.0");
    expect(spec.usage.description).toEqual(["Start the server"]);
    expect(spec.findSubcommand("help")?.name).toBe("help");

    const interpreter = createInterpreter(spec);
    interpreter.parse(["--name", "api", "-q", "--log-level", "DEBUG"]);
    expect(target).toEqual({ level: "DEBUG", quiet: true });
    expect(name.get()).toBe("api");

    interpreter.parse([]);
    expect(target).toEqual({ level: "INFO", quiet: false });
  });

  it("rejects mixin values the enum does not list", () => {
    const target: LoggingOptions = { level: "", quiet: false };
    const spec = CommandSpec.builder("serve").addMixin("logging", withLogging(target)).build();
    expect(() => createInterpreter(spec).parse(["--log-level", "TRACE"])).toThrow(
      "Invalid value for option '--log-level' (<log-level>): expected one of [ERROR, INFO, DEBUG] (case-sensitive) but was 'TRACE'",
    );
  });
});
