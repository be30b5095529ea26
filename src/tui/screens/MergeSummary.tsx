import React from 'react';
import { Box, Text } from 'ink';
import type { MergeReport } from '../../core/report.js';
import { Panel } from '../components/Panel.js';
import {
  formatSourceLine,
  getCountItems,
  getIssueLines,
  getRunItems,
  type RunInfo,
  type StatItem,
} from '../layout.js';
import { theme } from '../theme.js';

export type MergeSummaryProps = {
  report: MergeReport;
  run: RunInfo;
};

function StatList({ items }: { items: StatItem[] }): React.JSX.Element {
  return (
    <Box flexDirection="column">
      {items.map((item) => (
        <Box key={item.label} gap={1}>
          <Text color={theme.muted}>{item.label}:</Text>
          <Text>{item.value}</Text>
        </Box>
      ))}
    </Box>
  );
}

export function MergeSummary({ report, run }: MergeSummaryProps): React.JSX.Element {
  const issues = getIssueLines(report);

  return (
    <Box flexDirection="column" gap={1}>
      <Box gap={1}>
        <Panel title="Unified" tone="accent" boxProps={{ flexBasis: '40%' }}>
          <StatList items={getCountItems(report)} />
        </Panel>
        <Panel title="Run" boxProps={{ flexGrow: 1 }}>
          <StatList items={getRunItems(run)} />
        </Panel>
      </Box>
      <Panel title="Sources" badge={String(report.sources.length)}>
        {report.sources.length === 0 ? (
          <Text color={theme.muted}>No records in batch.</Text>
        ) : (
          report.sources.map((entry) => (
            <Text key={entry.source} color={entry.priority > 0 ? undefined : theme.muted}>
              {formatSourceLine(entry)}
            </Text>
          ))
        )}
      </Panel>
      {issues.length > 0 ? (
        <Panel title="Needs review" tone="warning">
          {issues.map((line) => (
            <Text key={line}>{line}</Text>
          ))}
        </Panel>
      ) : (
        <Text color={theme.status.ok}>No conflicts or skipped records.</Text>
      )}
    </Box>
  );
}
