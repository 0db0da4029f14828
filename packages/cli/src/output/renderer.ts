import pc from 'picocolors';
import type { BisectionReport, CompactResult, RankedProbe, Suggestion } from '@rebisect/core';
import type { CostStoreStats, RevisionCost } from '@rebisect/shared';
import { printTable } from './index';

const SHORT_REVISION = 12;

export function shortRevision(revision: string): string {
  return revision.slice(0, SHORT_REVISION);
}

/** Whole numbers print as they are, fractions with two decimals. */
export function formatCost(value: number): string {
  return Number.isInteger(value) ? String(value) : value.toFixed(2);
}

function probeJson(probe: RankedProbe) {
  return {
    revision: probe.revision,
    cost: probe.cost,
    expectedCost: probe.expectedCost,
    ifGood: probe.ifGood,
    ifBad: probe.ifBad,
  };
}

export class OutputRenderer {
  constructor(private readonly isJson: boolean) {}

  suggestion(suggestion: Suggestion, top: number): void {
    const { range, plan, probes } = suggestion;
    const expectedCost = plan.expectedCost(0, plan.size);
    const best = probes.slice(0, top);

    if (this.isJson) {
      this.emit({
        size: range.length,
        expectedCost,
        ...(probes.length === 0 ? { culprit: range[0] } : {}),
        probes: best.map(probeJson),
      });
      return;
    }

    if (probes.length === 0) {
      console.log(pc.green(`${range[0]} is the first bad revision.`));
      return;
    }

    console.log(
      pc.bold(`${range.length} revisions in range; ${formatCost(expectedCost)} rebuilds expected.`),
    );
    printTable(
      ['Revision', 'Expected', 'Rebuilds', 'If good', 'If bad'],
      best.map((probe) => [
        shortRevision(probe.revision),
        formatCost(probe.expectedCost),
        String(probe.cost),
        `${probe.ifGood.remaining} / ${formatCost(probe.ifGood.expectedCost)}`,
        `${probe.ifBad.remaining} / ${formatCost(probe.ifBad.expectedCost)}`,
      ]),
    );
    console.log(pc.gray('If good / If bad: revisions left / rebuilds expected afterwards.'));
  }

  costs(costs: RevisionCost[]): void {
    const total = costs.reduce((sum, entry) => sum + entry.cost, 0);

    if (this.isJson) {
      this.emit({ costs, total });
      return;
    }

    printTable(
      ['Revision', 'Rebuilds'],
      costs.map(({ revision, cost }) => [shortRevision(revision), String(cost)]),
    );
    console.log(`Total: ${total} rebuilds over ${costs.length} revisions`);
  }

  report(report: BisectionReport): void {
    if (this.isJson) {
      this.emit(report);
      return;
    }

    if (report.steps.length > 0) {
      printTable(
        ['Step', 'Revision', 'Rebuilds', 'Verdict', 'Left'],
        report.steps.map((step, i) => [
          String(i + 1),
          shortRevision(step.revision),
          String(step.cost),
          step.verdict === 'good' ? pc.green('good') : pc.red('bad'),
          String(step.remaining),
        ]),
      );
    }
    console.log(`\n${pc.green('✅')} ${pc.bold(report.culprit)} is the first bad revision.`);
    console.log(`  ${report.steps.length} steps, ${report.totalCost} rebuilds.`);
  }

  cacheStats(stats: CostStoreStats): void {
    if (this.isJson) {
      this.emit(stats);
      return;
    }

    console.log(`Location: ${stats.location}`);
    console.log(`Entries: ${stats.entries}`);
    if (stats.corruptRecords > 0) {
      console.log(pc.yellow(`Corrupt records: ${stats.corruptRecords}`));
    }
  }

  cleared(entries: number, location: string): void {
    if (this.isJson) {
      this.emit({ cleared: entries, location });
      return;
    }
    console.log(`Deleted ${entries} cached costs from ${location}.`);
  }

  compacted(result: CompactResult): void {
    if (this.isJson) {
      this.emit(result);
      return;
    }
    console.log(`Kept ${result.kept} records, dropped ${result.dropped}.`);
  }

  /** A single value: the raw value in human mode, `{ [key]: value }` in JSON mode. */
  value(key: string, value: string): void {
    if (this.isJson) {
      this.emit({ [key]: value });
    } else {
      console.log(value);
    }
  }

  log(message: string): void {
    if (!this.isJson) {
      console.log(pc.gray(message));
    }
  }

  private emit(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }
}
