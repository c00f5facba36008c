/**
 * Load a sequence from a JSON file
 */

import { createSequence } from '../core/build-sequence';
import { MDASequence } from '../core/mda-sequence';
import { isConfigurationError } from '../types/errors';
import { FileSystem } from '../types/file-system';
import { Logger } from '../types/logger';
import { Result, ok, err } from '../types/result';
import { getDefaultLogger } from '../logging/default-logger';
import { createRealFileSystem } from './real-file-system';

export type LoadSequenceErrorCode = 'NOT_FOUND' | 'READ_FAILED' | 'INVALID_JSON' | 'INVALID_SEQUENCE';

export interface LoadSequenceError {
  code: LoadSequenceErrorCode;
  message: string;
  path: string;
  /** Individual problems, for INVALID_SEQUENCE */
  issues: readonly string[];
}

export interface LoadSequenceOptions {
  fileSystem?: FileSystem;
  logger?: Logger;
}

function loadError(
  code: LoadSequenceErrorCode,
  path: string,
  message: string,
  issues: readonly string[] = []
): LoadSequenceError {
  return { code, path, message, issues };
}

export async function loadSequenceFile(
  path: string,
  options: LoadSequenceOptions = {}
): Promise<Result<MDASequence, LoadSequenceError>> {
  const fileSystem = options.fileSystem ?? createRealFileSystem();
  const logger = options.logger ?? getDefaultLogger();
  const fullPath = fileSystem.resolve(path);

  const fail = (error: LoadSequenceError): Result<MDASequence, LoadSequenceError> => {
    logger.event('input_validation_failed', error.message, { file: fullPath, code: error.code });
    return err(error);
  };

  const content = await fileSystem.readFile(fullPath);
  if (!content.ok) {
    return fail(
      content.error.code === 'NOT_FOUND'
        ? loadError('NOT_FOUND', fullPath, `Sequence file not found: ${path}`)
        : loadError('READ_FAILED', fullPath, content.error.message)
    );
  }

  let literal: unknown;
  try {
    literal = JSON.parse(content.value);
  } catch (e) {
    return fail(
      loadError('INVALID_JSON', fullPath, `Invalid JSON in ${path}: ${e instanceof Error ? e.message : String(e)}`)
    );
  }

  let sequence: MDASequence;
  try {
    sequence = createSequence(literal, { logger });
  } catch (e) {
    if (!isConfigurationError(e)) {
      throw e;
    }
    const issues = e.issues.length > 0 ? e.issues : [e.message];
    return fail(loadError('INVALID_SEQUENCE', fullPath, `Invalid sequence in ${path} (${e.rule})`, issues));
  }

  logger.event('input_loaded', `Loaded sequence from ${path}`, {
    file: fullPath,
    sequenceUid: sequence.uid,
  });
  return ok(sequence);
}
