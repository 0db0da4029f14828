import {
  BuildFailureError,
  type BuildCommand,
  type BuildInvoker,
  type Checkout,
  type Revision,
} from '@rebisect/shared';

/**
 * Measures how many artifacts a build command would build from scratch at a revision.
 * No retries and no caching happen here.
 */
export class CostOracle {
  constructor(
    private readonly checkout: Checkout,
    private readonly invoker: BuildInvoker,
  ) {}

  async measure(command: BuildCommand, revision: Revision): Promise<number> {
    const cost = await this.checkout.materialize(revision, (dir) =>
      this.invoker.dryRun(command, dir, revision),
    );

    if (!Number.isSafeInteger(cost) || cost < 0) {
      throw new BuildFailureError(revision, command.argv, `dry run reported an invalid cost: ${cost}`);
    }
    return cost;
  }
}
