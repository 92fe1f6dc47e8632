import fs from 'fs';
import os from 'os';
import path from 'path';
import { Config, OPENROUTER_BASE_URL } from '../Config';
import { DEFAULT_MEDIA_EXTENSIONS } from '../operations/FuzzyMatcher';

describe('Config defaults and loading', () => {
  let configDir: string;
  let warnSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;
  const homeDir = '/home/test-user';

  beforeEach(() => {
    configDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fcmd-config-'));
    warnSpy = jest.spyOn(console, 'warn').mockImplementation();
    errorSpy = jest.spyOn(console, 'error').mockImplementation();
  });

  afterEach(() => {
    fs.rmSync(configDir, { recursive: true, force: true });
    warnSpy.mockRestore();
    errorSpy.mockRestore();
  });

  function writeYaml(content: string): void {
    fs.writeFileSync(path.join(configDir, 'config.yaml'), content);
  }

  it('uses defaults when config.yaml is missing', () => {
    const cfg = new Config({ configDir, homeDir, platform: 'linux', env: { OPENROUTER_API_KEY: 'test-secret' } });

    expect(cfg.interpreter).toEqual({
      provider: 'openrouter',
      api_key: 'test-secret',
      model_name: 'deepseek/deepseek-r1',
      base_url: OPENROUTER_BASE_URL,
      temperature: 0,
      max_retries: 2,
      retry_base_delay_ms: 1000,
    });
    expect(cfg.locations).toEqual({
      start_dir: homeDir,
      movies_dir: path.join(homeDir, 'Movies'),
      aliases: {},
    });
    expect(cfg.playback.media_extensions).toEqual(DEFAULT_MEDIA_EXTENSIONS);
    expect(cfg.logging).toEqual({ history_file: path.join(configDir, 'logs', 'history.jsonl'), verbose: false });
    expect(cfg.getConfigFilePath()).toBe(path.join(configDir, 'config.yaml'));
  });

  it('defaults the movies folder to D:\\Movies on windows', () => {
    const cfg = new Config({ configDir, homeDir, platform: 'win32', env: {} });
    expect(cfg.locations.movies_dir).toBe('D:\\Movies');
    expect(cfg.interpreter.api_key).toBe('');
  });

  it('loads values from config.yaml when present', () => {
    writeYaml([
      'interpreter:',
      '  provider: gemini',
      '  model_name: gemini-custom',
      '  max_retries: 5',
      'locations:',
      '  start_dir: "~/work"',
      '  movies_dir: /media/films',
      '  aliases:',
      '    projects: "~/code"',
      'playback:',
      '  media_extensions: ["MKV", ".mp4"]',
      'logging:',
      '  verbose: true',
      '',
    ].join('\n'));

    const cfg = new Config({ configDir, homeDir, platform: 'linux', env: { GEMINI_API_KEY: 'test-secret' } });

    expect(cfg.interpreter.provider).toBe('gemini');
    expect(cfg.interpreter.api_key).toBe('test-secret');
    expect(cfg.interpreter.model_name).toBe('gemini-custom');
    expect(cfg.interpreter.base_url).toBeUndefined();
    expect(cfg.interpreter.max_retries).toBe(5);
    expect(cfg.apiKeyVariable()).toBe('GEMINI_API_KEY');
    expect(cfg.locations.start_dir).toBe(path.join(homeDir, 'work'));
    expect(cfg.locations.movies_dir).toBe('/media/films');
    expect(cfg.locations.aliases).toEqual({ projects: path.join(homeDir, 'code') });
    expect(cfg.playback.media_extensions).toEqual(['.mkv', '.mp4']);
    expect(cfg.logging.verbose).toBe(true);
  });

  it('falls back to openrouter for an unknown provider', () => {
    writeYaml('interpreter:\n  provider: skynet\n');
    const cfg = new Config({ configDir, homeDir, env: {} });
    expect(cfg.interpreter.provider).toBe('openrouter');
    expect(warnSpy).toHaveBeenCalledWith(expect.stringContaining("unknown interpreter provider 'skynet'"));
  });

  it('uses defaults when the YAML cannot be parsed', () => {
    writeYaml('interpreter: [unclosed\n');
    const cfg = new Config({ configDir, homeDir, env: {} });
    expect(cfg.interpreter.provider).toBe('openrouter');
    expect(errorSpy).toHaveBeenCalled();
  });

  it('reads the config directory from FCMD_HOME', () => {
    const cfg = new Config({ homeDir, env: { FCMD_HOME: configDir } });
    expect(cfg.configDir).toBe(configDir);
  });
});
