import path from 'node:path';
import React, { useEffect } from 'react';
import { Box, useApp } from 'ink';
import { Header } from './tui/components/Header.js';
import { MergeSummary, type MergeSummaryProps } from './tui/screens/MergeSummary.js';

export function App({ report, run }: MergeSummaryProps): React.JSX.Element {
  const { exit } = useApp();

  // The summary is static; unmount after the first frame so the CLI can exit.
  useEffect(() => {
    exit();
  }, [exit]);

  return (
    <Box flexDirection="column">
      <Header
        breadcrumb={['merge', path.basename(run.batchPath)]}
        detail={`${run.strategy} ≥ ${run.threshold}`}
      />
      <MergeSummary report={report} run={run} />
    </Box>
  );
}
