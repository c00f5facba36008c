#!/usr/bin/env node
/**
 * mda-sequence CLI entry point
 */

import { parseArgs, printUsage, ParsedArgs } from './cli';
import { CliFlags, resolveConfig } from './config/resolve-config';
import { formatEffectiveConfigForDisplay } from './config/format-effective-config';
import { runExpand } from './commands/expand';
import { createRealFileSystem } from './io/real-file-system';
import { ConsoleLogger } from './logging/console-logger';
import { setDefaultLogger } from './logging/default-logger';
import { ExitCode } from './types/exit-codes';
import { Logger, LogLevel } from './types/logger';
import { createInquirerPrompter } from './ui/inquirer-prompter';
import { createSpinnerService } from './ui/spinner-service';
import { VERSION } from './version';

export interface CliEnvironment {
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** Whether the terminal can show spinners and prompts */
  isTTY: boolean;
  cwd: string;
  /** Where the user config directory lives (defaults to the home directory) */
  homeDirectory?: string;
  /** Replaces the console logger built from the verbosity flags */
  logger?: Logger;
}

function defaultEnvironment(): CliEnvironment {
  return {
    stdout: process.stdout,
    stderr: process.stderr,
    isTTY: Boolean(process.stdout.isTTY && process.stderr.isTTY),
    cwd: process.cwd(),
  };
}

function toCliFlags(args: ParsedArgs): CliFlags {
  return {
    input: args.input,
    format: args.format ?? undefined,
    fov: args.fov ?? undefined,
    axisOrder: args.axisOrder ?? undefined,
    limit: args.limit ?? undefined,
    verbose: args.verbose,
    debug: args.debug,
    jsonLogs: args.jsonLogs,
    noInteractive: args.noInteractive || undefined,
  };
}

function createLogger(args: ParsedArgs): Logger {
  let minLevel: LogLevel = 'warn';
  if (args.debug) {
    minLevel = 'debug';
  } else if (args.verbose) {
    minLevel = 'info';
  }
  return new ConsoleLogger({ minLevel, jsonOutput: args.jsonLogs, includeTimestamp: args.debug });
}

/**
 * Run the CLI and return its exit code; nothing here calls process.exit
 */
export async function runCli(
  argv: string[],
  environment: CliEnvironment = defaultEnvironment()
): Promise<ExitCode> {
  const { stdout, stderr } = environment;
  const parsed = parseArgs(argv);
  if (!parsed.success) {
    stderr.write(`${parsed.error}\n\n`);
    printUsage(stderr);
    return ExitCode.USAGE_ERROR;
  }
  const args = parsed.args;

  if (args.help) {
    printUsage(stdout);
    return ExitCode.SUCCESS;
  }
  if (args.version) {
    stdout.write(`${VERSION}\n`);
    return ExitCode.SUCCESS;
  }
  if (!args.input) {
    stderr.write('Error: No sequence file provided\n\n');
    printUsage(stderr);
    return ExitCode.USAGE_ERROR;
  }

  const logger = environment.logger ?? createLogger(args);
  setDefaultLogger(logger);

  const config = resolveConfig(toCliFlags(args), environment.cwd, {
    homeDirectory: environment.homeDirectory,
    logger,
  });
  if (args.verbose || args.debug) {
    stderr.write(`${formatEffectiveConfigForDisplay(config)}\n`);
  }

  const spinners = createSpinnerService({
    isTTY: environment.isTTY,
    quiet: config.output.format === 'json',
    stream: stderr,
  });

  try {
    return await runExpand(config, {
      logger,
      prompter: createInquirerPrompter({
        interactive: config.interactivity.interactive,
        isTTY: environment.isTTY,
      }),
      spinners,
      fileSystem: createRealFileSystem(config.workingDirectory),
      write: (line) => stdout.write(`${line}\n`),
    });
  } catch (error) {
    logger.error(`Unexpected error: ${error instanceof Error ? error.message : String(error)}`, {
      stack: error instanceof Error ? error.stack : undefined,
    });
    return ExitCode.UNEXPECTED_ERROR;
  } finally {
    spinners.stopAll();
  }
}

if (require.main === module) {
  runCli(process.argv).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('Error:', error instanceof Error ? error.message : String(error));
      process.exitCode = ExitCode.UNEXPECTED_ERROR;
    }
  );
}
