import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConfigLoader, resolveCacheDir, resolveCacheFile } from './loader';
import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError, ConfigSchema } from '@rebisect/shared';

vi.mock('fs');
vi.mock('os');

describe('ConfigLoader', () => {
  const mockHome = '/mock/home';
  const mockCwd = '/mock/cwd';
  const userPath = path.join(mockHome, '.rebisect', 'config.yaml');
  const repoPath = path.join(mockCwd, '.rebisect.yaml');

  function withFiles(files: Record<string, string>) {
    vi.mocked(fs.existsSync).mockImplementation((p) => typeof p === 'string' && p in files);
    vi.mocked(fs.readFileSync).mockImplementation((p) => (typeof p === 'string' ? (files[p] ?? '') : ''));
  }

  beforeEach(() => {
    vi.resetAllMocks();
    vi.mocked(os.homedir).mockReturnValue(mockHome);
    withFiles({});
  });

  afterEach(() => {
    vi.clearAllMocks();
  });

  describe('load', () => {
    it('should load default config when no files exist', () => {
      const config = ConfigLoader.load({ cwd: mockCwd });
      expect(config).toEqual(ConfigSchema.parse({}));
      expect(config.build.dryRunFlag).toBe('--dry-run');
      expect(config.selection.maxCandidates).toBe(1500);
    });

    it('should load user config', () => {
      withFiles({ [userPath]: yaml.dump({ measure: { concurrency: 4 } }) });

      const config = ConfigLoader.load({ cwd: mockCwd });
      expect(config.measure).toEqual({ concurrency: 4, attempts: 1 });
    });

    it('should respect precedence: flags > explicit > repo > user', () => {
      withFiles({
        [userPath]: yaml.dump({ selection: { top: 1, maxCandidates: 10 } }),
        [repoPath]: yaml.dump({ selection: { top: 2 } }),
        '/explicit/config.yaml': yaml.dump({ selection: { top: 3 } }),
      });

      const config = ConfigLoader.load({
        cwd: mockCwd,
        configPath: '/explicit/config.yaml',
        flags: { selection: { top: 4 } },
      });

      expect(config.selection).toEqual({ top: 4, maxCandidates: 10 });
    });

    it('should fail if explicit config file is missing', () => {
      expect(() => ConfigLoader.load({ configPath: '/missing.yaml' })).toThrow(
        /Config file not found/,
      );
    });

    it('should report YAML syntax errors as ConfigError', () => {
      withFiles({ [repoPath]: 'build: [unclosed' });

      expect(() => ConfigLoader.load({ cwd: mockCwd })).toThrow(ConfigError);
      expect(() => ConfigLoader.load({ cwd: mockCwd })).toThrow(/Error parsing YAML file/);
    });

    it('should reject a file that is not a mapping', () => {
      withFiles({ [repoPath]: '- just\n- a list\n' });

      expect(() => ConfigLoader.load({ cwd: mockCwd })).toThrow(
        `Config file must contain a mapping: ${repoPath}`,
      );
    });

    it('should list every validation issue', () => {
      withFiles({
        [repoPath]: yaml.dump({ build: { artifactPattern: '([' }, measure: { concurrency: 0 } }),
      });

      expect(() => ConfigLoader.load({ cwd: mockCwd })).toThrow(
        'Configuration validation failed:\n' +
          '- build.artifactPattern: artifactPattern is not a valid regular expression\n' +
          '- measure.concurrency: Number must be greater than or equal to 1',
      );
    });
  });

  describe('mergeConfigs', () => {
    it('merges nested objects and replaces arrays', () => {
      const merged = ConfigLoader.mergeConfigs(
        { build: { dryRunFlag: '-n', cwd: '.' }, list: [1, 2] },
        { build: { cwd: 'pkgs' }, list: [3], skipped: undefined },
      );

      expect(merged).toEqual({ build: { dryRunFlag: '-n', cwd: 'pkgs' }, list: [3] });
    });
  });
});

describe('resolveCacheDir', () => {
  const config = ConfigSchema.parse({});

  it('prefers REBISECT_CACHE_DIR', () => {
    expect(
      resolveCacheDir({ cache: { ...config.cache, dir: '/cfg' } }, { REBISECT_CACHE_DIR: '~/c' }, '/h'),
    ).toBe('/h/c');
  });

  it('uses the configured directory next', () => {
    expect(resolveCacheDir({ cache: { ...config.cache, dir: '/cfg' } }, {}, '/h')).toBe('/cfg');
  });

  it('falls back to XDG_CACHE_HOME, then ~/.cache', () => {
    expect(resolveCacheDir(config, { XDG_CACHE_HOME: '/xdg' }, '/h')).toBe('/xdg/rebisect');
    expect(resolveCacheDir(config, {}, '/h')).toBe('/h/.cache/rebisect');
  });

  it('appends the store file name', () => {
    expect(resolveCacheFile(config, {}, '/h')).toBe('/h/.cache/rebisect/costs.jsonl');
  });
});
