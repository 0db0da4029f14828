/**
 * Opaque, totally ordered revision identifier. For git, a full commit hash.
 */
export type Revision = string;

/**
 * Outcome of testing a revision.
 * - `good`: the fault was introduced after this revision.
 * - `bad`: the fault is present at this revision.
 */
export type Verdict = 'good' | 'bad';

/**
 * A build command as the user typed it, plus the directory it runs in.
 */
export interface BuildCommand {
  /** Exact argument vector; compared byte for byte */
  argv: string[];
  /** Working directory relative to the checkout root */
  cwd: string;
}

/** A measured rebuild cost for one (command signature, revision) pair. */
export interface CostEntry {
  signature: string;
  revision: Revision;
  /** Number of artifacts the command would build from scratch */
  cost: number;
  /** ISO 8601 timestamp of the measurement */
  measuredAt: string;
}

/** A revision of the candidate range together with its rebuild cost. */
export interface RevisionCost {
  revision: Revision;
  cost: number;
}

/**
 * Bisection state owned by the revision-control system.
 * The range is ordered oldest first and ends with the known-bad boundary.
 */
export interface RevisionControl {
  currentRange(): Promise<Revision[]>;
  recordVerdict(revision: Revision, verdict: Verdict): Promise<void>;
}

/**
 * Makes a revision available as a working tree.
 */
export interface Checkout {
  /**
   * Runs `use` with the absolute path of a working tree at `revision`.
   * The tree belongs to the caller until the returned promise settles.
   */
  materialize<T>(revision: Revision, use: (dir: string) => Promise<T>): Promise<T>;
}

export interface BuildRunResult {
  exitCode: number;
  durationMs: number;
}

/**
 * Runs the build tool inside a working tree.
 */
export interface BuildInvoker {
  /** Number of artifacts the command would build; rejects with BuildFailureError */
  dryRun(command: BuildCommand, checkoutDir: string, revision: Revision): Promise<number>;
  /** Runs the command for real */
  run(command: BuildCommand, checkoutDir: string, revision: Revision): Promise<BuildRunResult>;
}

export interface CostStoreStats {
  entries: number;
  corruptRecords: number;
  location: string;
}

/**
 * Persistent mapping from (signature, revision) to a measured cost.
 * Entries are never updated or deleted one by one.
 */
export interface CostCacheStore {
  get(signature: string, revision: Revision): Promise<CostEntry | undefined>;
  /** Stores the entry unless the key already has one; returns the entry that is kept */
  insert(entry: CostEntry): Promise<CostEntry>;
  stats(): Promise<CostStoreStats>;
  /** Drops every entry */
  clear(): Promise<void>;
  close(): Promise<void>;
}
