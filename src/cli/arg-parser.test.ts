/**
 * Tests for CLI Argument Parser
 */

import { describe, it, expect } from 'vitest';
import { parseArgs } from './arg-parser';
import { DEFAULT_ARGS, ParseResult, ParsedArgs } from './types';

function parse(...args: string[]): ParseResult {
  return parseArgs(['node', 'mda-sequence', ...args]);
}

function parsed(...args: string[]): ParsedArgs {
  const result = parse(...args);
  if (!result.success) {
    throw new Error(`expected success, got: ${result.error}`);
  }
  return result.args;
}

function failure(...args: string[]): string {
  const result = parse(...args);
  if (result.success) {
    throw new Error('expected a parse failure');
  }
  return result.error;
}

describe('parseArgs', () => {
  describe('basic functionality', () => {
    it('should parse the sequence file path', () => {
      expect(parsed('sequence.json').input).toBe('sequence.json');
    });

    it('should set help flag with --help and -h', () => {
      expect(parsed('--help').help).toBe(true);
      expect(parsed('-h').help).toBe(true);
    });

    it('should set version flag with --version and -v', () => {
      expect(parsed('--version').version).toBe(true);
      expect(parsed('-v').version).toBe(true);
    });

    it('should reject a second positional argument', () => {
      expect(failure('a.json', 'b.json')).toBe('Error: Unexpected argument: b.json');
    });
  });

  describe('--format', () => {
    it('should parse with space', () => {
      expect(parsed('s.json', '--format', 'table').format).toBe('table');
    });

    it('should parse with equals', () => {
      expect(parsed('s.json', '--format=json').format).toBe('json');
    });

    it('should reject unknown formats', () => {
      expect(failure('s.json', '--format', 'xml')).toBe(
        'Error: --format must be one of: summary, table, json'
      );
    });
  });

  describe('--fov', () => {
    it('should parse width and height', () => {
      expect(parsed('s.json', '--fov', '512x256').fov).toEqual({ width: 512, height: 256 });
    });

    it('should accept decimals', () => {
      expect(parsed('s.json', '--fov=0.5x0.25').fov).toEqual({ width: 0.5, height: 0.25 });
    });

    it('should reject a malformed value', () => {
      expect(failure('s.json', '--fov', '512')).toBe(
        'Error: --fov must look like WIDTHxHEIGHT, e.g. 512x512'
      );
    });
  });

  describe('--axis-order', () => {
    it('should lower-case the order', () => {
      expect(parsed('s.json', '--axis-order', 'TPCZ').axisOrder).toBe('tpcz');
    });

    it('should reject unknown axes', () => {
      expect(failure('s.json', '--axis-order', 'tpq')).toBe(
        'Error: --axis-order: Can only iterate over axes t, p, c, z, g. Got extra: q'
      );
    });
  });

  describe('--limit', () => {
    it('should parse a positive integer', () => {
      expect(parsed('s.json', '--limit', '10').limit).toBe(10);
    });

    it('should reject zero', () => {
      expect(failure('s.json', '--limit', '0')).toBe('Error: --limit must be a positive integer');
    });

    it('should reject fractions', () => {
      expect(failure('s.json', '--limit', '2.5')).toBe('Error: --limit must be a positive integer');
    });
  });

  describe('boolean flags', () => {
    it('should parse verbosity and interactivity flags', () => {
      const args = parsed('s.json', '--no-interactive', '--verbose', '--debug', '--json-logs');
      expect(args.noInteractive).toBe(true);
      expect(args.verbose).toBe(true);
      expect(args.debug).toBe(true);
      expect(args.jsonLogs).toBe(true);
    });
  });

  describe('error handling', () => {
    it('should reject unknown options', () => {
      expect(failure('s.json', '--unknown')).toBe('Error: Unknown option: --unknown');
    });

    it('should require a value', () => {
      expect(failure('s.json', '--limit')).toBe('Error: --limit requires a value');
    });

    it('should require a value after equals', () => {
      expect(failure('s.json', '--format=')).toBe('Error: --format= requires a value');
    });

    it('should handle missing value when followed by another flag', () => {
      expect(failure('s.json', '--fov', '--verbose')).toBe('Error: --fov requires a value');
    });
  });

  describe('default values', () => {
    it('should use default values for unprovided options', () => {
      expect(parsed('s.json')).toEqual({ ...DEFAULT_ARGS, input: 's.json' });
    });
  });

  describe('complex scenarios', () => {
    it('should handle options in any order', () => {
      const args = parsed('--limit', '3', '--format', 'json', 'tiles.json', '--fov', '2x2');
      expect(args.input).toBe('tiles.json');
      expect(args.limit).toBe(3);
      expect(args.format).toBe('json');
      expect(args.fov).toEqual({ width: 2, height: 2 });
    });
  });
});
