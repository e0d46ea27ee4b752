import { statSync } from 'node:fs';
import { dirname, relative } from 'node:path';
import { Command } from 'commander';
import pc from 'picocolors';
import {
  loadConfig,
  loadSuiteFile,
  discoverSuiteFiles,
  resolveSettings,
} from '../../config/index.js';
import { DefinitionError, errorMessage } from '../../errors.js';
import { createExecutor } from '../../executor/index.js';
import { runSuites, toJsonReport, type LoadedSuite } from '../../runner/index.js';
import type { Settings } from '../../types/index.js';
import { formatSuiteResult, formatSummary } from '../report.js';

export interface RunOptions {
  apiUrl?: string;
  config?: string;
  debug?: string | boolean;
  verbose?: boolean;
  dryRun?: boolean;
  json?: boolean;
  record?: string;
  replay?: string;
}

export const EXIT_PASSED = 0;
export const EXIT_FAILED = 1;
export const EXIT_ABORTED = 2;

export const runCommand = new Command('run')
  .description('Run the test suites at a file or directory')
  .argument('[location]', 'Suite file or directory of suites')
  .option('--api-url <url>', 'Command API base URL')
  .option('--debug [dir]', 'Write debug artifacts for failing suites')
  .option('-c, --config <path>', 'Path to config file')
  .option('-v, --verbose', 'Verbose output')
  .option('-d, --dry-run', 'Validate suites without executing')
  .option('--json', 'Output results as JSON')
  .option('--record <dir>', 'Record command results to directory')
  .option('--replay <dir>', 'Replay command results from directory')
  .action(async (location: string | undefined, options: RunOptions) => {
    process.exit(await executeRun(location, options));
  });

/**
 * Run suites and print the report; returns the process exit code
 */
export async function executeRun(location: string | undefined, options: RunOptions): Promise<number> {
  const verbose = options.verbose ?? false;
  const jsonOutput = options.json ?? false;

  // Human output is suppressed in JSON mode
  const log = jsonOutput ? () => {} : console.log;
  const logError = jsonOutput ? () => {} : console.error;
  const fail = (message: string, code: number): number => {
    if (jsonOutput) {
      console.log(JSON.stringify({ error: message }, null, 2));
    } else {
      console.error(pc.red('Error:'), message);
    }
    return code;
  };

  if (options.record && options.replay) {
    return fail('--record and --replay are mutually exclusive', EXIT_FAILED);
  }

  const cwd = process.cwd();
  let settings: Settings;
  let suiteFiles: string[];
  try {
    const loaded = loadConfig({ configPath: options.config, cwd });
    if (verbose && loaded) {
      log(pc.dim(`Config loaded from: ${loaded.configPath}`));
    }
    settings = resolveSettings(
      { apiUrl: options.apiUrl, testLocation: location, debug: options.debug },
      process.env,
      loaded,
      cwd
    );
    suiteFiles = await discoverSuiteFiles(settings.testLocation);
  } catch (err) {
    return fail(errorMessage(err), err instanceof DefinitionError ? EXIT_FAILED : EXIT_ABORTED);
  }

  if (verbose) {
    log(pc.dim(`API: ${settings.apiUrl}`));
    log(pc.dim(`Tests: ${settings.testLocation}`));
  }

  if (suiteFiles.length === 0) {
    if (jsonOutput) {
      console.log(JSON.stringify({ suites: [], passed: true }, null, 2));
    } else {
      log(pc.yellow('No test suites found.'));
    }
    return EXIT_PASSED;
  }

  log(pc.cyan(`Found ${suiteFiles.length} test suite(s)\n`));

  // Load and validate every suite before running any
  const suites: LoadedSuite[] = [];
  const problems: string[] = [];
  for (const filePath of suiteFiles) {
    try {
      suites.push(loadSuiteFile(filePath));
      if (verbose) {
        log(pc.green('  ✓'), pc.dim(relative(cwd, filePath)));
      }
    } catch (err) {
      if (!(err instanceof DefinitionError)) {
        return fail(errorMessage(err), EXIT_ABORTED);
      }
      problems.push(err.message);
      logError(pc.red('  ✗'), relative(cwd, filePath));
      logError(pc.red('   '), err.message);
    }
  }

  if (problems.length > 0) {
    if (jsonOutput) {
      console.log(JSON.stringify({ errors: problems }, null, 2));
    } else {
      logError(pc.red('\nSome test suites failed validation.'));
    }
    return EXIT_FAILED;
  }

  if (options.dryRun) {
    if (jsonOutput) {
      console.log(JSON.stringify({
        validated: suites.map(({ suite, filePath }) => ({
          application: suite.application_slug,
          version: suite.application_version,
          cases: suite.test_cases.length,
          file: filePath,
        })),
      }, null, 2));
    } else {
      log(pc.green(`✓ Validated ${suites.length} suite(s)`));
      for (const { suite, filePath } of suites) {
        log(`  - ${suite.application_slug} ${suite.application_version}: ${suite.test_cases.length} case(s) (${relative(cwd, filePath)})`);
      }
    }
    return EXIT_PASSED;
  }

  const onDebug = verbose && !jsonOutput ? (msg: string) => log(pc.dim(msg)) : undefined;
  const onWarn = (msg: string) => logError(pc.yellow(`Warning: ${msg}`));

  try {
    const executor = createExecutor(settings, {
      recordDir: options.record,
      replayDir: options.replay,
      onDebug,
      onWarn,
    });

    const rootDir = statSync(settings.testLocation).isDirectory()
      ? settings.testLocation
      : dirname(settings.testLocation);

    const report = await runSuites(suites, {
      executor,
      rootDir,
      debugDir: settings.debugDir,
      onLog: (msg) => log(pc.cyan(msg)),
      onDebug,
      onWarn,
      onSuiteComplete: (result) => {
        for (const line of formatSuiteResult(result, { verbose })) {
          log(line);
        }
        log('');
      },
    });

    if (jsonOutput) {
      console.log(toJsonReport(report));
    } else {
      for (const line of formatSummary(report)) {
        log(line);
      }
    }

    if (report.aborted !== undefined) {
      return EXIT_ABORTED;
    }
    return report.passed ? EXIT_PASSED : EXIT_FAILED;
  } catch (err) {
    return fail(errorMessage(err), EXIT_ABORTED);
  }
}
