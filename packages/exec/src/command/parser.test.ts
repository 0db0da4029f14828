import { describe, it, expect } from 'vitest';
import { isShellCommand, parseCommand, tokenize } from './parser';

describe('tokenize', () => {
  it('splits on whitespace', () => {
    expect(tokenize('  nix-build  -A hello ')).toEqual(['nix-build', '-A', 'hello']);
  });

  it('keeps quoted words together and drops the quotes', () => {
    expect(tokenize(`./test.sh "two words" 'single quoted'`)).toEqual([
      './test.sh',
      'two words',
      'single quoted',
    ]);
  });

  it('keeps an empty quoted argument', () => {
    expect(tokenize(`run "" x`)).toEqual(['run', '', 'x']);
  });

  it('honours backslash escapes outside single quotes', () => {
    expect(tokenize('echo a\\ b')).toEqual(['echo', 'a b']);
    expect(tokenize(`echo 'a\\b'`)).toEqual(['echo', 'a\\b']);
  });
});

describe('parseCommand', () => {
  it('separates leading env assignments from the binary', () => {
    const parsed = parseCommand('NIXPKGS_ALLOW_UNFREE=1 nix-build -A steam');
    expect(parsed.env).toEqual({ NIXPKGS_ALLOW_UNFREE: '1' });
    expect(parsed.bin).toBe('nix-build');
    expect(parsed.args).toEqual(['-A', 'steam']);
    expect(parsed.raw).toBe('NIXPKGS_ALLOW_UNFREE=1 nix-build -A steam');
  });

  it('returns an empty binary when only assignments are given', () => {
    const parsed = parseCommand('A=1 B=2');
    expect(parsed.bin).toBe('');
    expect(parsed.args).toEqual([]);
    expect(parsed.env).toEqual({ A: '1', B: '2' });
  });
});

describe('isShellCommand', () => {
  it('detects shell operators', () => {
    expect(isShellCommand('make && ./check')).toBe(true);
    expect(isShellCommand('test $HOME')).toBe(true);
    expect(isShellCommand('./check.sh --fast')).toBe(false);
  });
});
