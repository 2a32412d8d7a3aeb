/**
 * Unit Tests for ConfigManager
 */

import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import fs from 'fs';
import path from 'path';
import { CONFIG_PATH_ENV, ConfigManager } from '../../src/core/config.js';
import { setLogLevel } from '../../src/core/logger.js';
import { createTempDir } from '../helpers/temp-dir.js';

const DEFAULTS = {
  server: { name: 'csv2json-mcp', version: '0.1.0' },
  transport: { mode: 'stdio', host: 'localhost', port: 8000, path: '/mcp' },
  logging: { level: 'info' },
};

describe('ConfigManager', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = createTempDir());
    setLogLevel('info');
  });

  afterEach(() => {
    cleanup();
    jest.restoreAllMocks();
  });

  function writeConfig(content: string): string {
    const configPath = path.join(dir, 'config.json');
    fs.writeFileSync(configPath, content, 'utf-8');
    return configPath;
  }

  it('should use defaults when the file does not exist', () => {
    const manager = new ConfigManager(path.join(dir, 'absent.json'));
    expect(manager.get()).toEqual(DEFAULTS);
  });

  it('should merge a partial user file over the defaults', () => {
    const configPath = writeConfig(
      JSON.stringify({ transport: { port: 9100 }, logging: { level: 'debug' } })
    );

    const manager = new ConfigManager(configPath);

    expect(manager.get()).toEqual({
      ...DEFAULTS,
      transport: { ...DEFAULTS.transport, port: 9100 },
      logging: { level: 'debug' },
    });
  });

  it('should fall back to defaults and warn for an invalid file', () => {
    const errorSpy = jest.spyOn(console, 'error').mockImplementation(() => {});
    const configPath = writeConfig(JSON.stringify({ transport: { port: 'eighty' } }));

    const manager = new ConfigManager(configPath);

    expect(manager.get()).toEqual(DEFAULTS);
    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0][0])).toContain('Ignoring invalid config');
  });

  it('should fall back to defaults for malformed JSON', () => {
    jest.spyOn(console, 'error').mockImplementation(() => {});
    const configPath = writeConfig('{ not json');

    expect(new ConfigManager(configPath).get()).toEqual(DEFAULTS);
  });

  it('should apply updates without touching other sections', () => {
    const manager = new ConfigManager(path.join(dir, 'absent.json'));

    manager.update({ transport: { mode: 'http', port: 8123 } });

    expect(manager.get().transport).toEqual({
      mode: 'http',
      host: 'localhost',
      port: 8123,
      path: '/mcp',
    });
    expect(manager.get().server).toEqual(DEFAULTS.server);
  });

  it('should hand out copies', () => {
    const manager = new ConfigManager(path.join(dir, 'absent.json'));
    manager.get().transport.port = 1;
    expect(manager.get().transport.port).toBe(8000);
  });

  it('should read the path from the environment when none is given', () => {
    const previous = process.env[CONFIG_PATH_ENV];
    const configPath = writeConfig(JSON.stringify({ server: { name: 'from-env' } }));
    process.env[CONFIG_PATH_ENV] = configPath;
    try {
      const manager = new ConfigManager();
      expect(manager.getPath()).toBe(configPath);
      expect(manager.get().server.name).toBe('from-env');
    } finally {
      if (previous === undefined) {
        delete process.env[CONFIG_PATH_ENV];
      } else {
        process.env[CONFIG_PATH_ENV] = previous;
      }
    }
  });
});
