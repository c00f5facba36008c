/**
 * Prompter interface
 * Abstracts user prompts so the CLI can run non-interactively and in tests
 */

import { Result } from './result';

export interface ConfirmOptions {
  /** The question to ask */
  message: string;
  /** Default answer, also used when prompts are unavailable */
  default?: boolean;
}

export type PrompterErrorCode = 'CANCELLED' | 'NON_INTERACTIVE' | 'IO_ERROR';

export interface PrompterError {
  code: PrompterErrorCode;
  message: string;
  cause?: Error;
}

export interface Prompter {
  /**
   * Ask for confirmation (yes/no)
   */
  confirm(options: ConfirmOptions): Promise<Result<boolean, PrompterError>>;

  /**
   * Check if prompts are available (TTY and interactive mode)
   */
  isInteractive(): boolean;
}

export function createPrompterError(
  code: PrompterErrorCode,
  message?: string,
  cause?: Error
): PrompterError {
  const defaultMessages: Record<PrompterErrorCode, string> = {
    CANCELLED: 'User cancelled the prompt',
    NON_INTERACTIVE: 'Cannot prompt in non-interactive mode',
    IO_ERROR: 'IO error during prompt',
  };

  return {
    code,
    message: message ?? defaultMessages[code],
    cause,
  };
}
