#!/usr/bin/env node

import React from 'react';
import { render } from 'ink';
import { App } from './app.js';
import { buildProgram } from './cli.js';
import { formatUnknownError } from './core/error-utils.js';

const program = buildProgram({
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  renderSummary: async (report, run) => {
    const instance = render(<App report={report} run={run} />);
    await instance.waitUntilExit();
  },
});

program.parseAsync(process.argv).catch((err: unknown) => {
  process.stderr.write(`paddock-merge: ${formatUnknownError(err)}\n`);
  process.exitCode = 1;
});
