/**
 * expand command
 *
 * Loads a sequence file, applies the run's field of view and axis order,
 * and writes the expanded events in the requested format.
 */

import { MDASequence } from '../core/mda-sequence';
import { EffectiveConfig } from '../types/effective-config';
import { isConfigurationError } from '../types/errors';
import { ExitCode } from '../types/exit-codes';
import { FileSystem } from '../types/file-system';
import { Logger } from '../types/logger';
import { Prompter } from '../types/prompter';
import { loadSequenceFile } from '../io/load-sequence-file';
import { SpinnerService } from '../ui/spinner-service';
import { eventRow, formatEventJson, formatSummary, formatTable } from './format-events';

/** Spinner text is refreshed every this many events */
const PROGRESS_INTERVAL = 1000;

export interface ExpandDependencies {
  logger: Logger;
  prompter: Prompter;
  spinners: SpinnerService;
  /** Receives one line of output (no trailing newline) */
  write: (line: string) => void;
  fileSystem?: FileSystem;
  /** Milliseconds since an arbitrary origin */
  now?: () => number;
}

/**
 * Load the configured file and apply the run's overrides.
 * The field of view is set last: replace() does not carry it over.
 */
async function prepareSequence(
  config: EffectiveConfig,
  deps: ExpandDependencies
): Promise<MDASequence | ExitCode> {
  const loaded = await loadSequenceFile(config.input, { fileSystem: deps.fileSystem, logger: deps.logger });
  if (!loaded.ok) {
    deps.logger.error(loaded.error.message, { file: loaded.error.path, code: loaded.error.code });
    for (const issue of loaded.error.issues) {
      deps.logger.error(`  ${issue}`, { file: loaded.error.path });
    }
    return loaded.error.code === 'NOT_FOUND' ? ExitCode.USAGE_ERROR : ExitCode.VALIDATION_ERROR;
  }

  let sequence = loaded.value;
  if (config.axisOrder !== undefined && config.axisOrder !== sequence.axisOrder) {
    try {
      sequence = sequence.replace({ axisOrder: config.axisOrder });
    } catch (error) {
      if (!isConfigurationError(error)) {
        throw error;
      }
      deps.logger.error(`Cannot use axis order ${config.axisOrder}: ${error.message}`, { rule: error.rule });
      return ExitCode.VALIDATION_ERROR;
    }
  }
  sequence.setFovSize(config.fov.width, config.fov.height);
  return sequence;
}

/**
 * Ask before expanding a sequence that raised warnings.
 * Without a terminal (or with --no-interactive) expansion goes ahead.
 */
async function confirmWarnings(sequence: MDASequence, deps: ExpandDependencies): Promise<boolean> {
  if (sequence.warnings.length === 0 || !deps.prompter.isInteractive()) {
    return true;
  }
  const answer = await deps.prompter.confirm({
    message: `Sequence has ${sequence.warnings.length} warning(s). Expand anyway?`,
    default: true,
  });
  if (!answer.ok) {
    deps.logger.warn(answer.error.message, { code: answer.error.code });
    return false;
  }
  return answer.value;
}

/**
 * Run the expand command and return the process exit code
 */
export async function runExpand(config: EffectiveConfig, deps: ExpandDependencies): Promise<ExitCode> {
  const prepared = await prepareSequence(config, deps);
  if (!(prepared instanceof MDASequence)) {
    return prepared;
  }
  const sequence = prepared;

  if (!(await confirmWarnings(sequence, deps))) {
    deps.logger.info('Expansion cancelled');
    return ExitCode.CANCELLED;
  }

  const { format, limit } = config.output;
  const now = deps.now ?? Date.now;
  const startedAt = now();
  deps.logger.event('expansion_started', `Expanding ${sequence.toString()}`, {
    sequenceUid: sequence.uid,
    format,
    fov: { ...sequence.fovSize },
  });

  const spinner = deps.spinners.start(`Expanding ${sequence.usedAxes || 'empty'} sequence`);
  const rows: string[][] = [];
  let count = 0;
  try {
    for (const event of sequence.iterEvents()) {
      if (format !== 'summary' && limit !== undefined && count >= limit) {
        break;
      }
      count++;
      if (format === 'json') {
        deps.write(formatEventJson(event));
      } else if (format === 'table') {
        rows.push(eventRow(event, sequence.axes));
      }
      if (count % PROGRESS_INTERVAL === 0) {
        spinner.setText(`Expanded ${count} events`);
      }
    }
  } catch (error) {
    spinner.fail('Expansion failed');
    throw error;
  }

  if (format === 'table') {
    formatTable(rows).forEach((line) => deps.write(line));
  } else if (format === 'summary') {
    formatSummary(sequence, count).forEach((line) => deps.write(line));
  }

  spinner.succeed(`Expanded ${count} events`);
  deps.logger.event('expansion_completed', `Expanded ${count} events`, {
    sequenceUid: sequence.uid,
    count,
    durationMs: now() - startedAt,
  });
  return ExitCode.SUCCESS;
}
