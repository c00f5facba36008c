/**
 * Inquirer-based Prompter
 */

import inquirer from 'inquirer';
import { Prompter, ConfirmOptions, PrompterError, createPrompterError } from '../types/prompter';
import { Result, ok, err } from '../types/result';

export interface InquirerPrompterConfig {
  /** false when --no-interactive was given */
  interactive: boolean;
  /** Whether stdin/stdout are a terminal (defaults to process.stdout.isTTY) */
  isTTY?: boolean;
}

export class InquirerPrompter implements Prompter {
  private readonly config: InquirerPrompterConfig;

  constructor(config: Partial<InquirerPrompterConfig> = {}) {
    this.config = { interactive: config.interactive ?? true, isTTY: config.isTTY };
  }

  isInteractive(): boolean {
    return this.config.interactive && (this.config.isTTY ?? process.stdout.isTTY ?? false);
  }

  async confirm(options: ConfirmOptions): Promise<Result<boolean, PrompterError>> {
    if (!this.isInteractive()) {
      if (options.default !== undefined) {
        return ok(options.default);
      }
      return err(createPrompterError('NON_INTERACTIVE', 'Cannot prompt for confirmation in non-interactive mode'));
    }

    try {
      const answer = await inquirer.prompt<{ proceed: boolean }>([
        {
          type: 'confirm',
          name: 'proceed',
          message: options.message,
          default: options.default ?? true,
        },
      ]);
      return ok(answer.proceed);
    } catch (error) {
      if (error instanceof Error && (error.message.includes('User force closed') || error.name === 'ExitPromptError')) {
        return err(createPrompterError('CANCELLED'));
      }
      return err(
        createPrompterError(
          'IO_ERROR',
          `confirm failed: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error : undefined
        )
      );
    }
  }
}

export function createInquirerPrompter(config?: Partial<InquirerPrompterConfig>): Prompter {
  return new InquirerPrompter(config);
}
