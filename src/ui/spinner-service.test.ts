/**
 * Tests for the spinner service
 */

import { describe, it, expect } from 'vitest';
import { createSpinnerService } from './spinner-service';
import { CaptureStream } from '../../tests/utils/capture-stream';

describe('SpinnerService', () => {
  it('should write one line per state change without a terminal', () => {
    const stream = new CaptureStream();
    const spinners = createSpinnerService({ isTTY: false, stream });

    const spinner = spinners.start('Expanding tcz sequence');
    spinner.setText('Expanded 1000 events');
    spinner.succeed();

    expect(stream.lines).toEqual(['> Expanding tcz sequence', '✅ Expanded 1000 events']);
    expect(spinner.isSpinning).toBe(false);
  });

  it('should report failures', () => {
    const stream = new CaptureStream();
    const spinner = createSpinnerService({ isTTY: false, stream }).start('Expanding');

    spinner.fail('Expansion failed');

    expect(stream.lines).toEqual(['> Expanding', '❌ Expansion failed']);
  });

  it('should write nothing when quiet', () => {
    const stream = new CaptureStream();
    const spinner = createSpinnerService({ quiet: true, isTTY: true, stream }).start('Expanding');

    expect(spinner.isSpinning).toBe(true);
    spinner.succeed('done');

    expect(stream.text).toBe('');
    expect(spinner.isSpinning).toBe(false);
  });

  it('should stop the previous spinner when a new one starts', () => {
    const stream = new CaptureStream();
    const spinners = createSpinnerService({ isTTY: false, stream });

    const first = spinners.start('first');
    spinners.start('second');

    expect(first.isSpinning).toBe(false);
    expect(stream.lines).toEqual(['> first', '> second']);
  });
});
