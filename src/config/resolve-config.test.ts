/**
 * Tests for Configuration Resolution
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { resolveConfig, parseFov, PROJECT_CONFIG_FILE, CliFlags } from './resolve-config';
import { createBufferLogger, BufferLogger } from '../logging/buffer-logger';
import { createTempDirContext, TempDirContext } from '../../tests/utils/temp-directory';

describe('resolveConfig', () => {
  let project: TempDirContext;
  let home: TempDirContext;
  let logger: BufferLogger;

  beforeEach(() => {
    project = createTempDirContext();
    home = createTempDirContext();
    logger = createBufferLogger();
  });

  afterEach(() => {
    project.cleanup();
    home.cleanup();
  });

  function resolve(flags: CliFlags = {}) {
    return resolveConfig(flags, project.path, { homeDirectory: home.path, logger });
  }

  it('should fall back to defaults', () => {
    const config = resolve();
    expect(config.fov).toEqual({ width: 1, height: 1 });
    expect(config.output.format).toBe('summary');
    expect(config.output.limit).toBeUndefined();
    expect(config.interactivity.interactive).toBe(true);
    expect(config.sources?.format).toBe('default');
    expect(config.workingDirectory).toBe(project.path);
  });

  it('should prefer the project config over the user config', () => {
    home.writeJson('.config/mda-sequence/config.json', { format: 'table', limit: 5 });
    project.writeJson(PROJECT_CONFIG_FILE, { format: 'json' });

    const config = resolve();
    expect(config.output.format).toBe('json');
    expect(config.sources?.format).toBe('project');
    expect(config.output.limit).toBe(5);
    expect(config.sources?.limit).toBe('user');
  });

  it('should prefer CLI flags over every file', () => {
    project.writeJson(PROJECT_CONFIG_FILE, { format: 'json', fov: { width: 2, height: 2 } });

    const config = resolve({ format: 'table', noInteractive: true });
    expect(config.output.format).toBe('table');
    expect(config.sources?.format).toBe('cli');
    expect(config.fov).toEqual({ width: 2, height: 2 });
    expect(config.interactivity.interactive).toBe(false);
    expect(config.sources?.interactive).toBe('cli');
  });

  it('should ignore and report an invalid config file', () => {
    project.writeJson(PROJECT_CONFIG_FILE, { format: 'xml' });

    const config = resolve();
    expect(config.output.format).toBe('summary');
    const warnings = logger.getEventsByLevel('warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].metadata.file).toBe(`${project.path}/${PROJECT_CONFIG_FILE}`);
  });

  it('should ignore and report unparseable JSON', () => {
    project.writeFile(PROJECT_CONFIG_FILE, '{ not json');

    resolve();
    expect(logger.getEventsByLevel('warn')[0].message).toMatch(/^Ignoring config file: /);
  });

  it('should log the resolved sources', () => {
    resolve();
    expect(logger.hasEventType('config_resolved')).toBe(true);
  });
});

describe('parseFov', () => {
  it('should parse WIDTHxHEIGHT', () => {
    expect(parseFov('512x256')).toEqual({ width: 512, height: 256 });
    expect(parseFov('0.5X0.25')).toEqual({ width: 0.5, height: 0.25 });
  });

  it('should reject malformed or empty sizes', () => {
    expect(parseFov('512')).toBeNull();
    expect(parseFov('0x10')).toBeNull();
    expect(parseFov('-1x10')).toBeNull();
  });
});
