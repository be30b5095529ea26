import type { MergeReport, SourceContribution } from '../core/report.js';

export type StatItem = { label: string; value: string };

export type RunInfo = {
  batchPath: string;
  outDir: string;
  logPath: string;
  strategy: string;
  threshold: number;
  durationMs: number;
};

const plural = (count: number, noun: string) => `${count} ${noun}${count === 1 ? '' : 's'}`;

export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms) || ms < 0) return 'n/a';
  if (ms < 1000) return `${Math.round(ms)} ms`;
  return `${(ms / 1000).toFixed(1)} s`;
}

export function getRunItems(run: RunInfo): StatItem[] {
  return [
    { label: 'Batch', value: run.batchPath },
    { label: 'Output', value: run.outDir },
    { label: 'Log', value: run.logPath },
    { label: 'Matching', value: `${run.strategy} ≥ ${run.threshold}` },
    { label: 'Took', value: formatDuration(run.durationMs) },
  ];
}

export function getCountItems(report: MergeReport): StatItem[] {
  return [
    { label: 'Drivers', value: String(report.counts.drivers) },
    { label: 'Constructors', value: String(report.counts.constructors) },
    { label: 'Races', value: String(report.counts.races) },
    { label: 'Results', value: String(report.counts.results) },
  ];
}

export function formatSourceLine(entry: SourceContribution): string {
  const parts = [
    entry.drivers > 0 ? plural(entry.drivers, 'driver') : null,
    entry.constructors > 0 ? plural(entry.constructors, 'constructor') : null,
    entry.races > 0 ? plural(entry.races, 'race') : null,
    entry.results > 0 ? plural(entry.results, 'result') : null,
  ].filter((part): part is string => part !== null);
  return `${entry.source} (p${entry.priority}): ${parts.length > 0 ? parts.join(', ') : 'nothing'}`;
}

export function getIssueLines(report: MergeReport, limit = 5): string[] {
  const lines: string[] = [];
  const fields = Object.entries(report.conflictFields).sort(
    (a, b) => b[1] - a[1] || a[0].localeCompare(b[0]),
  );
  if (fields.length > 0) {
    lines.push(
      `${plural(report.conflicts, 'conflict')}: ${fields.map(([field, count]) => `${field} ${count}`).join(', ')}`,
    );
  }
  for (const skip of [...report.skipped].sort((a, b) => b.count - a.count)) {
    lines.push(`skipped ${plural(skip.count, skip.entity)}: ${skip.reason}`);
  }
  if (report.normalizeFailures > 0) {
    lines.push(`${plural(report.normalizeFailures, 'value')} failed to normalize`);
  }
  if (lines.length <= limit) return lines;
  return [...lines.slice(0, limit - 1), `… ${lines.length - limit + 1} more in the log`];
}
