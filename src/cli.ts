import { Command, CommanderError } from "commander";
import { applyPatch } from "./patch-applier";
import { CONFIG_DEFAULTS } from "./core/config-normalizer";
import { createUsageError, reportError } from "./core/error-handler";
import type { OutputSink } from "./types";

export const VERSION = "1.0.0";

interface CliOptions {
  matchFile: string;
  replaceFile: string;
  verbose?: boolean;
}

export interface CliIO {
  output?: OutputSink;
  cwd?: string;
}

export function createProgram(
  output: OutputSink,
  onRun: (targets: string[], options: CliOptions) => void
): Command {
  const program = new Command();

  program
    .name(CONFIG_DEFAULTS.PROGRAM_NAME)
    .description("Replace an exact block of text in a file with another block")
    .version(VERSION)
    .usage("[options] <target_file>")
    .argument("[target_file...]", "file to patch")
    .option(
      "-m, --match-file <path>",
      "file holding the text to find",
      CONFIG_DEFAULTS.MATCH_FILE
    )
    .option(
      "-r, --replace-file <path>",
      "file holding the replacement text",
      CONFIG_DEFAULTS.REPLACE_FILE
    )
    .option("-v, --verbose", "print error codes, details and suggestions")
    .addHelpText(
      "after",
      `\nA target path starting with "-" goes after --, e.g. ${CONFIG_DEFAULTS.PROGRAM_NAME} -- -notes.txt`
    )
    .exitOverride()
    .configureOutput({
      writeOut: (str) => output(str.trimEnd()),
      writeErr: (str) => output(str.trimEnd()),
    })
    .action((targets: string[]) => {
      onRun(targets, program.opts<CliOptions>());
    });

  return program;
}

/**
 * 执行命令行，返回退出码而不是直接退出进程
 * @param argv 不含 node 和脚本路径的参数
 */
export function run(argv: string[], io: CliIO = {}): number {
  const output = io.output ?? console.log;
  let exitCode = 0;

  const program = createProgram(output, (targets, options) => {
    if (targets.length !== 1) {
      const error = createUsageError();
      reportError(error, output, false);
      exitCode = error.exitCode;
      return;
    }

    const [targetPath] = targets;
    const result = applyPatch(targetPath, {
      cwd: io.cwd,
      matchFile: options.matchFile,
      replaceFile: options.replaceFile,
    });

    if (result.error) {
      reportError(result.error, output, options.verbose === true);
      exitCode = result.error.exitCode;
      return;
    }

    output(`Successfully patched ${targetPath}`);
    if (options.verbose) {
      output(`Replaced ${result.occurrences} occurrence(s)`);
    }
  });

  try {
    program.parse(argv, { from: "user" });
  } catch (error) {
    // --help / --version / 未知选项
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }

  return exitCode;
}
