import path from "node:path";
import { Command, CommanderError } from "commander";
import { previewCommentaryFile, synchronizeCommentaryFile, verifyCommentaryFile, type SessionOptions } from "./core.mjs";
import { MismatchError } from "./errors.mjs";
import { getLogLevel, setLogLevel } from "./logger.mjs";

export const VERSION = "0.1.0";

export interface CliContext {
  cwd: string;
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
}

type CommonOptions = {
  target?: string;
  root?: string;
  config?: string;
  verbose?: boolean;
};

type PreviewOptions = CommonOptions & {
  full?: boolean;
};

export function processContext(): CliContext {
  return {
    cwd: process.cwd(),
    writeOut: (text) => process.stdout.write(text),
    writeErr: (text) => process.stderr.write(text)
  };
}

function toSessionOptions(
  context: CliContext,
  source: string | undefined,
  hint: string | undefined,
  options: CommonOptions
): SessionOptions {
  if (options.verbose) {
    setLogLevel("debug");
  }
  return {
    cwd: context.cwd,
    source,
    targetHint: hint,
    explicitTarget: options.target,
    projectRoot: options.root,
    configPath: options.config
  };
}

function displayPath(context: CliContext, filePath: string): string {
  const relative = path.relative(context.cwd, filePath);
  return relative && !relative.startsWith("..") ? relative : filePath;
}

function sessionCommand(name: string, description: string, context: CliContext): Command {
  return new Command(name)
    .description(description)
    .argument("[source]", "Markdown document to render (default: README.md)")
    .argument("[target]", "name of the file holding the commentary block")
    .option("-t, --target <path>", "use this target file, skipping resolution")
    .option("-r, --root <dir>", "project root used to look for the target")
    .option("-c, --config <path>", "configuration file")
    .option("-v, --verbose", "log resolution steps to stderr")
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({ writeOut: context.writeOut, writeErr: context.writeErr });
}

function checkCommand(context: CliContext): Command {
  const command = sessionCommand("check", "Verify that the commentary block matches the source document", context);
  return command.action((source: string | undefined, hint: string | undefined) => {
    const targetPath = verifyCommentaryFile(toSessionOptions(context, source, hint, command.opts<CommonOptions>()));
    context.writeOut(`${displayPath(context, targetPath)}: commentary is up to date\n`);
  });
}

function updateCommand(context: CliContext): Command {
  const command = sessionCommand("update", "Write the rendered source document into the commentary block", context);
  return command.action((source: string | undefined, hint: string | undefined) => {
    const targetPath = synchronizeCommentaryFile(
      toSessionOptions(context, source, hint, command.opts<CommonOptions>())
    );
    context.writeOut(`${displayPath(context, targetPath)}: commentary updated\n`);
  });
}

function previewCommand(context: CliContext): Command {
  const command = sessionCommand("preview", "Print the rendered commentary without writing it", context).option(
    "--full",
    "print the whole target file as it would be written"
  );
  return command.action((source: string | undefined, hint: string | undefined) => {
    const options = command.opts<PreviewOptions>();
    const preview = previewCommentaryFile(toSessionOptions(context, source, hint, options));
    context.writeOut(options.full ? preview.content : `${preview.rendered.text}\n`);
  });
}

export function createProgram(context: CliContext): Command {
  return new Command()
    .name("md-commentary")
    .description("Keep a library's commentary block in sync with its README")
    .version(VERSION)
    .exitOverride()
    .configureOutput({ writeOut: context.writeOut, writeErr: context.writeErr })
    .addCommand(checkCommand(context), { isDefault: true })
    .addCommand(updateCommand(context))
    .addCommand(previewCommand(context));
}

export async function runCli(argv: readonly string[], context: CliContext = processContext()): Promise<number> {
  const program = createProgram(context);
  const logLevel = getLogLevel();
  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    if (error instanceof MismatchError) {
      context.writeOut(error.report);
    }
    context.writeErr(`error: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  } finally {
    setLogLevel(logLevel);
  }
}
