import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { defaultConfigPath, loadConfig } from '../config';
import { ConfigError } from '../errors';

describe('loadConfig', () => {
  let dir: string;
  let missingPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tracelet-config-'));
    missingPath = path.join(dir, 'missing.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const file = path.join(dir, 'config.json');
    fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
    return file;
  }

  it('should fall back to defaults', () => {
    const config = loadConfig({ configPath: missingPath }, {});

    expect(config).toEqual({
      apiKey: undefined,
      apiUrl: 'http://localhost:5173/api',
      workspaceName: 'default',
      projectName: 'Default Project',
      batchSize: 100,
      flushIntervalMs: 1000,
      maxRetries: 3,
      logLevel: 'warn',
      disabled: false,
    });
  });

  it('should prefer explicit options over env over file', () => {
    const configPath = writeConfig({ projectName: 'from-file', workspaceName: 'file-ws', batchSize: 5 });

    const config = loadConfig(
      { projectName: 'explicit', configPath },
      { TRACELET_PROJECT_NAME: 'from-env', TRACELET_WORKSPACE: 'env-ws' }
    );

    expect(config.projectName).toBe('explicit');
    expect(config.workspaceName).toBe('env-ws');
    expect(config.batchSize).toBe(5);
  });

  it('should parse numbers and booleans from env', () => {
    const config = loadConfig(
      { configPath: missingPath },
      {
        TRACELET_BATCH_SIZE: '25',
        TRACELET_MAX_RETRIES: '5',
        TRACELET_TRACK_DISABLE: 'TRUE',
        TRACELET_API_KEY: 'test-secret',
      }
    );

    expect(config.batchSize).toBe(25);
    expect(config.maxRetries).toBe(5);
    expect(config.disabled).toBe(true);
    expect(config.apiKey).toBe('test-secret');
  });

  it('should accept 1 and 0 for boolean env vars', () => {
    expect(loadConfig({ configPath: missingPath }, { TRACELET_TRACK_DISABLE: '1' }).disabled).toBe(true);
    expect(loadConfig({ configPath: missingPath }, { TRACELET_TRACK_DISABLE: '0' }).disabled).toBe(false);
  });

  it('should ignore empty env vars', () => {
    const config = loadConfig({ configPath: missingPath }, { TRACELET_PROJECT_NAME: '' });
    expect(config.projectName).toBe('Default Project');
  });

  it('should reject invalid env values', () => {
    expect(() => loadConfig({ configPath: missingPath }, { TRACELET_BATCH_SIZE: 'many' })).toThrow(
      'Invalid value for TRACELET_BATCH_SIZE'
    );
    expect(() => loadConfig({ configPath: missingPath }, { TRACELET_TRACK_DISABLE: 'yes' })).toThrow(ConfigError);
  });

  it('should strip trailing slashes from the api url', () => {
    const config = loadConfig({ apiUrl: 'https://traces.example.com/api/', configPath: missingPath }, {});
    expect(config.apiUrl).toBe('https://traces.example.com/api');
  });

  it('should read TRACELET_URL_OVERRIDE', () => {
    const config = loadConfig({ configPath: missingPath }, { TRACELET_URL_OVERRIDE: 'https://env.example.com/api' });
    expect(config.apiUrl).toBe('https://env.example.com/api');
  });

  it('should reject invalid explicit options', () => {
    expect(() => loadConfig({ batchSize: 0, configPath: missingPath }, {})).toThrow('Invalid tracelet options');
  });

  it('should reject unknown keys in the config file', () => {
    const configPath = writeConfig({ projectName: 'p', colour: 'blue' });
    expect(() => loadConfig({ configPath }, {})).toThrow(/^Invalid config file/);
  });

  it('should reject a config file that is not JSON', () => {
    const configPath = writeConfig('project = "p"');
    expect(() => loadConfig({ configPath }, {})).toThrow('is not valid JSON');
  });
});

describe('defaultConfigPath', () => {
  it('should use TRACELET_CONFIG_PATH when set', () => {
    expect(defaultConfigPath({ TRACELET_CONFIG_PATH: '/etc/tracelet.json' })).toBe('/etc/tracelet.json');
  });

  it('should default to the home directory', () => {
    expect(defaultConfigPath({})).toBe(path.join(os.homedir(), '.tracelet', 'config.json'));
  });
});
