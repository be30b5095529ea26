import path from 'node:path';
import { performance } from 'node:perf_hooks';
import { Command, InvalidArgumentError } from 'commander';
import { countBatchRecords, loadMergeBatch } from './core/batch.js';
import {
  SETTABLE_KEYS,
  getAppConfigPath,
  isSettableKey,
  parseConfigValue,
  parseStrategyName,
  parseThreshold,
  readAppConfig,
  setSourceTimezone,
  updateAppConfig,
  type AppConfig,
} from './core/config.js';
import { formatUnknownError } from './core/error-utils.js';
import { DEFAULT_SIMILARITY_THRESHOLD } from './core/matcher.js';
import { createMergeLogger } from './core/merge-logger.js';
import { createMerger } from './core/merger.js';
import { writeUnifiedDataset } from './core/output.js';
import { buildMergeReport, createEventCollector, type MergeReport } from './core/report.js';
import { SIMILARITY_STRATEGIES, type SimilarityStrategyName } from './core/similarity.js';
import { SOURCE_PRIORITY } from './core/source-priority.js';
import { APP_NAME, getDataDir, getLogDir } from './core/xdg.js';
import type { RunInfo } from './tui/layout.js';

export type CliDeps = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  renderSummary: (report: MergeReport, run: RunInfo) => Promise<void>;
  appName?: string;
  now?: () => number;
  // Throw commander errors instead of exiting the process.
  exitOverride?: boolean;
};

type MergeCommandOptions = {
  out?: string;
  threshold?: number;
  strategy?: SimilarityStrategyName;
  verbose?: boolean;
  json?: boolean;
};

export type MergeRun = {
  report: MergeReport;
  run: RunInfo;
  files: string[];
};

function asArgument<T>(parse: (raw: string) => T): (raw: string) => T {
  return (raw) => {
    try {
      return parse(raw);
    } catch (err) {
      throw new InvalidArgumentError(formatUnknownError(err));
    }
  };
}

export async function runMerge(
  batchPath: string,
  options: MergeCommandOptions,
  { appName = APP_NAME, now = () => performance.now() }: Pick<CliDeps, 'appName' | 'now'> = {},
): Promise<MergeRun> {
  const started = now();
  const config = await readAppConfig(appName);
  const threshold =
    options.threshold ?? config.similarityThreshold ?? DEFAULT_SIMILARITY_THRESHOLD;
  const strategy = options.strategy ?? config.similarityStrategy ?? 'sequence';
  const { logPath, logger, flush } = createMergeLogger({
    logDir: getLogDir(appName),
    verbose: options.verbose ?? false,
  });

  try {
    const batch = await loadMergeBatch(batchPath);
    logger({
      type: 'run-started',
      batchPath,
      records: countBatchRecords(batch),
      strategy,
      threshold,
    });

    const collector = createEventCollector(logger);
    const merger = createMerger({
      threshold,
      strategy: SIMILARITY_STRATEGIES[strategy],
      sourceTimezones: config.sourceTimezones,
      log: collector.sink,
    });
    const dataset = merger.mergeBatch(batch);

    const outDir = path.resolve(options.out ?? config.outputDir ?? path.join(getDataDir(appName), 'merged'));
    const files = await writeUnifiedDataset(outDir, dataset);
    const report = buildMergeReport(dataset, collector.events, SOURCE_PRIORITY);
    const durationMs = now() - started;
    logger({ type: 'run-finished', outDir, durationMs });

    return {
      report,
      files,
      run: { batchPath, outDir, logPath, strategy, threshold, durationMs },
    };
  } catch (err) {
    logger({ type: 'run-failed', message: formatUnknownError(err) });
    throw err;
  } finally {
    await flush();
  }
}

function formatConfig(config: AppConfig): string {
  return Object.keys(config).length === 0 ? '(empty)' : JSON.stringify(config, null, 2);
}

export function buildProgram(deps: CliDeps): Command {
  const appName = deps.appName ?? APP_NAME;
  const program = new Command();
  program
    .name(APP_NAME)
    .description('Resolve and merge F1 drivers, constructors, races and results across sources')
    .configureOutput({ writeOut: deps.stdout, writeErr: deps.stderr });
  if (deps.exitOverride) program.exitOverride();

  program
    .command('merge')
    .description('Merge a batch file of per-source records into unified entities')
    .argument('<batch>', 'JSON file of records grouped by entity and source')
    .option('-o, --out <dir>', 'Directory for the unified JSON files')
    .option(
      '-t, --threshold <n>',
      'Name similarity needed to match drivers (0-1)',
      asArgument(parseThreshold),
    )
    .option(
      '-s, --strategy <name>',
      'Similarity strategy: sequence or token-set',
      asArgument(parseStrategyName),
    )
    .option('-v, --verbose', 'Log every match decision')
    .option('--json', 'Print the report as JSON instead of the summary screen')
    .action(async (batchPath: string, options: MergeCommandOptions) => {
      const result = await runMerge(batchPath, options, { appName, now: deps.now });
      if (options.json) {
        const payload = { ...result.run, files: result.files, report: result.report };
        deps.stdout(`${JSON.stringify(payload, null, 2)}\n`);
        return;
      }
      await deps.renderSummary(result.report, result.run);
    });

  const config = program.command('config').description('Show or change stored settings');

  config
    .command('show')
    .description('Print the config file path and contents')
    .action(async () => {
      const current = await readAppConfig(appName);
      deps.stdout(`${getAppConfigPath(appName)}\n${formatConfig(current)}\n`);
    });

  config
    .command('set')
    .description(`Set one of: ${SETTABLE_KEYS.join(', ')}`)
    .argument('<key>', 'Setting name')
    .argument('<value>', 'New value')
    .action(async (key: string, value: string) => {
      if (!isSettableKey(key)) {
        throw new Error(`Unknown setting "${key}". Settable keys: ${SETTABLE_KEYS.join(', ')}.`);
      }
      const next = await updateAppConfig(parseConfigValue(key, value), appName);
      deps.stdout(`${formatConfig(next)}\n`);
    });

  config
    .command('unset')
    .description('Remove a stored setting')
    .argument('<key>', 'Setting name')
    .action(async (key: string) => {
      if (!isSettableKey(key)) {
        throw new Error(`Unknown setting "${key}". Settable keys: ${SETTABLE_KEYS.join(', ')}.`);
      }
      const patch: Partial<AppConfig> = {};
      patch[key] = undefined;
      const next = await updateAppConfig(patch, appName);
      deps.stdout(`${formatConfig(next)}\n`);
    });

  config
    .command('timezone')
    .description('Set the IANA zone for a source\'s naive timestamps; omit the zone to clear it')
    .argument('<source>', 'Source name, e.g. fia')
    .argument('[zone]', 'IANA zone, e.g. Europe/London')
    .action(async (source: string, zone: string | undefined) => {
      const next = await setSourceTimezone(source, zone, appName);
      deps.stdout(`${formatConfig(next)}\n`);
    });

  return program;
}
