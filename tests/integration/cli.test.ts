/**
 * End-to-end tests for the mda-sequence CLI
 *
 * Runs the CLI in process against the JSON fixtures, with a temporary
 * working directory and home directory so no real config is read.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { runCli } from '../../src/main';
import { ExitCode } from '../../src/types/exit-codes';
import { BufferLogger, createBufferLogger } from '../../src/logging/buffer-logger';
import { resetDefaultLogger } from '../../src/logging/default-logger';
import { VERSION } from '../../src/version';
import { createTempDirContext, TempDirContext } from '../utils/temp-directory';
import { CaptureStream } from '../utils/capture-stream';

const FIXTURES = join(__dirname, '..', 'fixtures');

function fixture(name: string): string {
  return readFileSync(join(FIXTURES, name), 'utf-8');
}

describe('mda-sequence CLI', () => {
  let workspace: TempDirContext;
  let home: TempDirContext;
  let stdout: CaptureStream;
  let stderr: CaptureStream;
  let logger: BufferLogger;

  beforeEach(() => {
    workspace = createTempDirContext();
    home = createTempDirContext();
    stdout = new CaptureStream();
    stderr = new CaptureStream();
    logger = createBufferLogger();
    for (const name of [
      'timelapse.json',
      'autofocus.json',
      'sub-sequence.json',
      'invalid-axis-order.json',
      'strided-channels.json',
    ]) {
      workspace.writeFile(name, fixture(name));
    }
  });

  afterEach(() => {
    workspace.cleanup();
    home.cleanup();
    resetDefaultLogger();
  });

  function run(...args: string[]): Promise<ExitCode> {
    return runCli(['node', 'mda-sequence', ...args], {
      stdout,
      stderr,
      isTTY: false,
      cwd: workspace.path,
      homeDirectory: home.path,
      logger,
    });
  }

  function jsonLines(): Array<Record<string, unknown>> {
    return stdout.lines.map((line) => JSON.parse(line));
  }

  describe('usage', () => {
    it('should print help to stdout', async () => {
      expect(await run('--help')).toBe(ExitCode.SUCCESS);
      expect(stdout.lines[0]).toBe('Usage: mda-sequence <sequence.json> [options]');
    });

    it('should print the version', async () => {
      expect(await run('--version')).toBe(ExitCode.SUCCESS);
      expect(stdout.text).toBe(`${VERSION}\n`);
    });

    it('should reject unknown options', async () => {
      expect(await run('timelapse.json', '--bogus')).toBe(ExitCode.USAGE_ERROR);
      expect(stderr.lines[0]).toBe('Error: Unknown option: --bogus');
      expect(stdout.text).toBe('');
    });

    it('should require a sequence file', async () => {
      expect(await run()).toBe(ExitCode.USAGE_ERROR);
      expect(stderr.lines[0]).toBe('Error: No sequence file provided');
    });

    it('should report a missing file as a usage error', async () => {
      expect(await run('nope.json')).toBe(ExitCode.USAGE_ERROR);
      expect(logger.getEventsByType('error')[0].message).toBe('Sequence file not found: nope.json');
    });
  });

  describe('summary', () => {
    it('should summarize the sequence', async () => {
      expect(await run('timelapse.json')).toBe(ExitCode.SUCCESS);
      expect(stdout.lines).toEqual([
        'Multi-Dimensional Acquisition ▶ nt: 2, np: 1, nc: 1, nz: 4',
        'Axis order: tpcz',
        'Axes:',
        '  time (t): 2',
        '  position (p): 1',
        '  channel (c): 1',
        '  z (z): 4',
        'Shape: [2, 1, 1, 4]',
        'Total events: 8',
      ]);
    });

    it('should report progress on stderr without a terminal', async () => {
      await run('timelapse.json');
      expect(stderr.lines).toEqual(['> Expanding tpcz sequence', '✅ Expanded 8 events']);
    });

    it('should include sequence warnings', async () => {
      expect(await run('strided-channels.json', '--no-interactive')).toBe(ExitCode.SUCCESS);
      expect(stdout.lines.filter((line) => line.startsWith('Warning (channel_stride_order): '))).toHaveLength(1);
      expect(stdout.lines[stdout.lines.length - 1]).toBe('Total events: 2');
      expect(logger.getEventsByType('sequence_warning')).toHaveLength(1);
    });
  });

  describe('json', () => {
    it('should write one event per line, outer axis slowest', async () => {
      expect(await run('timelapse.json', '--format', 'json')).toBe(ExitCode.SUCCESS);

      const events = jsonLines();
      expect(events).toHaveLength(8);
      expect(events[0]).toEqual({
        globalIndex: 0,
        index: { t: 0, p: 0, c: 0, z: 0 },
        minStartTime: 0,
        posName: 'well-A1',
        xPos: 10,
        yPos: 20,
        zPos: 3.5,
        exposure: 50,
        channel: { config: 'DAPI', group: 'Channel' },
        sequenceUid: expect.any(String),
      });
      expect(events.map((e) => e.minStartTime)).toEqual([0, 0, 0, 0, 2, 2, 2, 2]);
      expect(events.map((e) => e.zPos)).toEqual([3.5, 4.5, 5.5, 6.5, 3.5, 4.5, 5.5, 6.5]);
      expect(events.map((e) => e.globalIndex)).toEqual([0, 1, 2, 3, 4, 5, 6, 7]);
    });

    it('should keep stderr quiet', async () => {
      await run('timelapse.json', '--format=json');
      expect(stderr.text).toBe('');
    });

    it('should honor --limit', async () => {
      await run('timelapse.json', '--format', 'json', '--limit', '3');
      expect(jsonLines().map((e) => e.globalIndex)).toEqual([0, 1, 2]);
    });

    it('should apply --axis-order', async () => {
      await run('timelapse.json', '--format', 'json', '--axis-order', 'tpzc', '--limit', '2');
      expect(jsonLines().map((e) => e.index)).toEqual([
        { t: 0, p: 0, z: 0, c: 0 },
        { t: 0, p: 0, z: 1, c: 0 },
      ]);
    });

    it('should autofocus once per position change', async () => {
      await run('autofocus.json', '--format', 'json');

      const events = jsonLines();
      expect(events).toHaveLength(12);
      const focused = events.filter((e) => e.autofocus !== undefined);
      expect(focused.map((e) => e.globalIndex)).toEqual([0, 3, 6, 9]);
      expect(focused.map((e) => e.autofocus)).toEqual([
        { autofocusDeviceName: 'Z1', zStagePosition: 10 },
        { autofocusDeviceName: 'Z1', zStagePosition: 20 },
        { autofocusDeviceName: 'Z1', zStagePosition: 10 },
        { autofocusDeviceName: 'Z1', zStagePosition: 20 },
      ]);
    });

    it('should expand position sub-sequences in place', async () => {
      await run('sub-sequence.json', '--format', 'json');

      const events = jsonLines();
      expect(events.map((e) => [e.posName, e.zPos])).toEqual([
        ['plain', 0],
        ['plain', 1],
        ['deep', 100],
        ['deep', 101],
        ['deep', 102],
      ]);
      expect(events[4].index).toEqual({ p: 1, c: 0, z: 2 });
    });
  });

  describe('configuration', () => {
    it('should read the project config file', async () => {
      workspace.writeJson('.mda-sequence.json', { format: 'json', limit: 2 });

      expect(await run('timelapse.json')).toBe(ExitCode.SUCCESS);
      expect(jsonLines()).toHaveLength(2);
    });

    it('should let flags override the project config', async () => {
      workspace.writeJson('.mda-sequence.json', { format: 'json', limit: 2 });

      await run('timelapse.json', '--format', 'summary');
      expect(stdout.lines[stdout.lines.length - 1]).toBe('Total events: 8');
    });

    it('should print the effective configuration when verbose', async () => {
      await run('timelapse.json', '--verbose', '--fov', '2x3');
      expect(stderr.lines).toContain('│ FOV:          2x3 (cli)');
    });
  });

  describe('validation', () => {
    it('should fail on an invalid axis order', async () => {
      expect(await run('invalid-axis-order.json')).toBe(ExitCode.VALIDATION_ERROR);
      expect(stdout.text).toBe('');
      expect(logger.hasEventType('input_validation_failed')).toBe(true);
    });

    it('should fail on malformed JSON', async () => {
      workspace.writeFile('broken.json', '{ "channels": ');
      expect(await run('broken.json')).toBe(ExitCode.VALIDATION_ERROR);
      expect(logger.getEventsByType('input_validation_failed')[0].metadata.code).toBe('INVALID_JSON');
    });
  });
});
