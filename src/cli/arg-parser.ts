/**
 * CLI Argument Parser
 *
 * Parses command line arguments into structured ParsedArgs
 */

import { ParsedArgs, ParseResult, DEFAULT_ARGS } from './types';
import { FovConfig, OUTPUT_FORMATS, OutputFormat, isOutputFormat } from '../types/effective-config';
import { parseFov } from '../config/resolve-config';
import { parseAxisOrder } from '../core/validate-sequence';
import { isConfigurationError } from '../types/errors';

type Parsed<T> = { ok: true; value: T } | { ok: false; error: string };

function parsePositiveInt(value: string, name: string): Parsed<number> {
  if (!/^\d+$/.test(value) || parseInt(value, 10) < 1) {
    return { ok: false, error: `${name} must be a positive integer` };
  }
  return { ok: true, value: parseInt(value, 10) };
}

function parseFormat(value: string): Parsed<OutputFormat> {
  if (!isOutputFormat(value)) {
    return { ok: false, error: `--format must be one of: ${OUTPUT_FORMATS.join(', ')}` };
  }
  return { ok: true, value };
}

function parseFovArg(value: string): Parsed<FovConfig> {
  const fov = parseFov(value);
  if (!fov) {
    return { ok: false, error: '--fov must look like WIDTHxHEIGHT, e.g. 512x512' };
  }
  return { ok: true, value: fov };
}

/**
 * Checked here so a bad order is a usage error rather than a validation error
 */
function parseAxisOrderArg(value: string): Parsed<string> {
  try {
    return { ok: true, value: parseAxisOrder(value).join('') };
  } catch (error) {
    if (isConfigurationError(error)) {
      return { ok: false, error: `--axis-order: ${error.message}` };
    }
    throw error;
  }
}

/**
 * Get the value for an argument, handling both --arg value and --arg=value formats
 */
function getArgValue(args: readonly string[], index: number, argName: string): Parsed<string> & { skip: number } {
  const arg = args[index];

  const eq = arg.indexOf('=');
  if (eq >= 0) {
    const value = arg.slice(eq + 1);
    if (!value) {
      return { ok: false, error: `${argName}= requires a value`, skip: 0 };
    }
    return { ok: true, value, skip: 0 };
  }

  const nextArg = args[index + 1];
  if (nextArg === undefined || nextArg.startsWith('--')) {
    return { ok: false, error: `${argName} requires a value`, skip: 0 };
  }
  return { ok: true, value: nextArg, skip: 1 };
}

/**
 * Read a valued option and run its parser
 */
function readOption<T>(
  args: readonly string[],
  index: number,
  argName: string,
  parse: (value: string) => Parsed<T>
): Parsed<T> & { skip: number } {
  const raw = getArgValue(args, index, argName);
  if (!raw.ok) {
    return raw;
  }
  const parsed = parse(raw.value);
  return parsed.ok ? { ...parsed, skip: raw.skip } : { ...parsed, skip: 0 };
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParseResult {
  const args = argv.slice(2); // Remove node and script path
  const result: ParsedArgs = { ...DEFAULT_ARGS };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const argBase = arg.split('=')[0];

    switch (argBase) {
      case '--help':
      case '-h': {
        result.help = true;
        break;
      }

      case '--version':
      case '-v': {
        result.version = true;
        break;
      }

      case '--format': {
        const parsed = readOption(args, i, '--format', parseFormat);
        if (!parsed.ok) return { success: false, error: `Error: ${parsed.error}` };
        result.format = parsed.value;
        i += parsed.skip;
        break;
      }

      case '--fov': {
        const parsed = readOption(args, i, '--fov', parseFovArg);
        if (!parsed.ok) return { success: false, error: `Error: ${parsed.error}` };
        result.fov = parsed.value;
        i += parsed.skip;
        break;
      }

      case '--axis-order': {
        const parsed = readOption(args, i, '--axis-order', parseAxisOrderArg);
        if (!parsed.ok) return { success: false, error: `Error: ${parsed.error}` };
        result.axisOrder = parsed.value;
        i += parsed.skip;
        break;
      }

      case '--limit': {
        const parsed = readOption(args, i, '--limit', (value) => parsePositiveInt(value, '--limit'));
        if (!parsed.ok) return { success: false, error: `Error: ${parsed.error}` };
        result.limit = parsed.value;
        i += parsed.skip;
        break;
      }

      case '--no-interactive': {
        result.noInteractive = true;
        break;
      }

      case '--verbose': {
        result.verbose = true;
        break;
      }

      case '--debug': {
        result.debug = true;
        break;
      }

      case '--json-logs': {
        result.jsonLogs = true;
        break;
      }

      default: {
        if (arg.startsWith('-')) {
          return { success: false, error: `Error: Unknown option: ${argBase}` };
        }
        if (result.input) {
          return { success: false, error: `Error: Unexpected argument: ${arg}` };
        }
        result.input = arg;
      }
    }
  }

  return { success: true, args: result };
}
