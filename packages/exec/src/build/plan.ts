import type { BuildConfig } from '@rebisect/shared';

/**
 * Distinct artifacts named in a dry-run report, in order of first appearance.
 */
export function parsePlannedArtifacts(output: string, pattern: string): string[] {
  const seen = new Set<string>();
  for (const match of output.matchAll(new RegExp(pattern, 'g'))) {
    if (match[0].length > 0) {
      seen.add(match[0]);
    }
  }
  return [...seen];
}

/**
 * The part of a dry run's output that carries its plan.
 */
export function selectPlanOutput(
  run: { stdout: string; stderr: string },
  stream: BuildConfig['outputStream'],
): string {
  switch (stream) {
    case 'stdout':
      return run.stdout;
    case 'stderr':
      return run.stderr;
    case 'both':
      return `${run.stdout}\n${run.stderr}`;
  }
}

/** Last `lines` lines of a process output, for error details. */
export function tail(output: string, lines = 20): string {
  return output.trimEnd().split('\n').slice(-lines).join('\n');
}
