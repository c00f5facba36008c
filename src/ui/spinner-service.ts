/**
 * Spinner Service
 * Progress display for long expansions; ora on a TTY, plain lines elsewhere.
 * Spinners write to stderr so that stdout carries only event output.
 */

import ora, { Ora } from 'ora';

export interface Spinner {
  start(): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  warn(text?: string): void;
  setText(text: string): void;
  /** Stop without a final status line */
  stop(): void;
  readonly isSpinning: boolean;
}

export interface SpinnerServiceConfig {
  isTTY: boolean;
  /** Suppress all spinner output */
  quiet: boolean;
  stream: NodeJS.WritableStream;
}

/**
 * Spinner for quiet mode
 */
class NullSpinner implements Spinner {
  private spinning = false;

  start(): void {
    this.spinning = true;
  }
  succeed(): void {
    this.spinning = false;
  }
  fail(): void {
    this.spinning = false;
  }
  warn(): void {
    this.spinning = false;
  }
  setText(): void {}
  stop(): void {
    this.spinning = false;
  }
  get isSpinning(): boolean {
    return this.spinning;
  }
}

/**
 * One line per state change, for pipes and CI logs
 */
class TextSpinner implements Spinner {
  private spinning = false;

  constructor(
    private text: string,
    private readonly stream: NodeJS.WritableStream
  ) {}

  private line(symbol: string, text: string): void {
    this.stream.write(`${symbol} ${text}\n`);
  }

  start(): void {
    this.spinning = true;
    this.line('>', this.text);
  }

  succeed(text?: string): void {
    this.spinning = false;
    this.line('✅', text ?? this.text);
  }

  fail(text?: string): void {
    this.spinning = false;
    this.line('❌', text ?? this.text);
  }

  warn(text?: string): void {
    this.spinning = false;
    this.line('⚠️ ', text ?? this.text);
  }

  // Intermediate progress is not repeated on a plain stream
  setText(text: string): void {
    this.text = text;
  }

  stop(): void {
    this.spinning = false;
  }

  get isSpinning(): boolean {
    return this.spinning;
  }
}

class OraSpinner implements Spinner {
  private readonly spinner: Ora;

  constructor(text: string, stream: NodeJS.WritableStream) {
    this.spinner = ora({ text, stream, color: 'cyan' });
  }

  start(): void {
    this.spinner.start();
  }
  succeed(text?: string): void {
    this.spinner.succeed(text);
  }
  fail(text?: string): void {
    this.spinner.fail(text);
  }
  warn(text?: string): void {
    this.spinner.warn(text);
  }
  setText(text: string): void {
    this.spinner.text = text;
  }
  stop(): void {
    this.spinner.stop();
  }
  get isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

export class SpinnerService {
  private readonly config: SpinnerServiceConfig;
  private active: Spinner | null = null;

  constructor(config: Partial<SpinnerServiceConfig> = {}) {
    this.config = {
      isTTY: config.isTTY ?? process.stderr.isTTY ?? false,
      quiet: config.quiet ?? false,
      stream: config.stream ?? process.stderr,
    };
  }

  /**
   * Create and start a spinner, stopping any previous one
   */
  start(text: string): Spinner {
    this.stopAll();
    let spinner: Spinner;
    if (this.config.quiet) {
      spinner = new NullSpinner();
    } else if (this.config.isTTY) {
      spinner = new OraSpinner(text, this.config.stream);
    } else {
      spinner = new TextSpinner(text, this.config.stream);
    }
    this.active = spinner;
    spinner.start();
    return spinner;
  }

  stopAll(): void {
    if (this.active?.isSpinning) {
      this.active.stop();
    }
    this.active = null;
  }
}

export function createSpinnerService(config?: Partial<SpinnerServiceConfig>): SpinnerService {
  return new SpinnerService(config);
}
