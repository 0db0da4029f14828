import { describe, it, expect } from 'vitest';
import { ConfigSchema, DEFAULT_ARTIFACT_PATTERN } from './schema';

describe('ConfigSchema', () => {
  it('fills every section with defaults', () => {
    const config = ConfigSchema.parse({});

    expect(config).toEqual({
      configVersion: 1,
      build: {
        dryRunFlag: '--dry-run',
        outputStream: 'stderr',
        artifactPattern: DEFAULT_ARTIFACT_PATTERN,
        cwd: '.',
      },
      cache: { file: 'costs.jsonl' },
      selection: { maxCandidates: 1500, top: 5 },
      measure: { concurrency: 1, attempts: 1 },
      driver: { maxSteps: 64 },
    });
  });

  it('keeps partial sections and defaults the rest', () => {
    const config = ConfigSchema.parse({
      build: { outputStream: 'both' },
      measure: { concurrency: 4 },
    });

    expect(config.build.outputStream).toBe('both');
    expect(config.build.dryRunFlag).toBe('--dry-run');
    expect(config.measure).toEqual({ concurrency: 4, attempts: 1 });
  });

  it('rejects an artifact pattern that is not a regular expression', () => {
    const result = ConfigSchema.safeParse({ build: { artifactPattern: '([' } });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0].path).toEqual(['build', 'artifactPattern']);
      expect(result.error.issues[0].message).toBe(
        'artifactPattern is not a valid regular expression',
      );
    }
  });

  it('rejects a non-positive concurrency and an unknown config version', () => {
    expect(ConfigSchema.safeParse({ measure: { concurrency: 0 } }).success).toBe(false);
    expect(ConfigSchema.safeParse({ configVersion: 2 }).success).toBe(false);
  });
});
