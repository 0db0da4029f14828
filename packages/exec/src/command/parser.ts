export interface ParsedCommand {
  /** Leading `KEY=value` assignments */
  env: Record<string, string>;
  bin: string;
  args: string[];
  raw: string;
}

/**
 * Splits a command line into words, honouring quotes and backslash escapes.
 */
export function tokenize(input: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: "'" | '"' | null = null;
  let escape = false;

  const trimmed = input.trim();

  for (let i = 0; i < trimmed.length; i++) {
    const char = trimmed[i];

    if (escape) {
      current += char;
      escape = false;
    } else if (char === '\\' && quote !== "'") {
      escape = true;
      inToken = true;
    } else if (quote) {
      if (char === quote) {
        quote = null;
      } else {
        current += char;
      }
    } else if (char === "'" || char === '"') {
      quote = char;
      inToken = true;
    } else if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += char;
      inToken = true;
    }
  }

  if (inToken) {
    tokens.push(current);
  }

  return tokens;
}

export function parseCommand(input: string): ParsedCommand {
  const tokens = tokenize(input);

  // Env var pattern: key=value, key must be a valid identifier
  const env: Record<string, string> = {};
  let cmdIndex = 0;
  while (cmdIndex < tokens.length && /^[a-zA-Z_][a-zA-Z0-9_]*=/.test(tokens[cmdIndex])) {
    const token = tokens[cmdIndex];
    const eq = token.indexOf('=');
    env[token.slice(0, eq)] = token.slice(eq + 1);
    cmdIndex++;
  }

  if (cmdIndex >= tokens.length) {
    // e.g. "A=1"
    return { env, bin: '', args: [], raw: input };
  }

  return {
    env,
    bin: tokens[cmdIndex],
    args: tokens.slice(cmdIndex + 1),
    raw: input,
  };
}

/** Detects characters that require a shell to interpret. */
export function isShellCommand(command: string): boolean {
  return /[|&;<>`$]/.test(command);
}
