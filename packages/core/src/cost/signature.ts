import { objectHash, sha256 } from 'ohash';
import type { BuildCommand } from '@rebisect/shared';

/**
 * Identity of a build command for caching: SHA-256 hex of its canonical form.
 * Any byte of difference in argv, working directory or dry-run flag gives a new signature.
 */
export function commandSignature(command: BuildCommand, dryRunFlag: string): string {
  return sha256(objectHash({ argv: command.argv, cwd: command.cwd, dryRunFlag }));
}
