import { Command, Option } from 'commander';
import * as os from 'os';
import * as path from 'path';
import type { RunOptions } from './types.js';
import type { ContainerBackend } from './container/backend.js';
import { CliBackend, probeBackendTool } from './container/cli-backend.js';
import { runPerfTests, type DriverReport } from './runner/driver.js';
import { ConfigError } from './utils/run-config.js';

export const VERSION = '1.0.0';

export interface CliOptions {
  debug?: boolean;
  sourceDir?: string;
  jobs?: string;
  keepLog?: boolean;
  stopOnFirstFailure?: boolean;
  withDiffoscope?: boolean;
  buildWithClang?: boolean;
  sanitize?: boolean;
  report?: boolean;
  withCcache?: boolean;
  withSccache?: boolean;
  cacheOnly?: boolean;
  extraOpts?: string;
  extraOpts2?: string;
  extraOpts3?: string;
  extraVersionString?: string;
  compressedCacheSize?: boolean;
  timestampParams?: string;
  enableTests?: boolean;
  separateDebPrep?: boolean;
  testsConf: string;
  template: string;
  profile?: string;
  namespace: string;
  workspace?: string;
  resultsDir?: string;
  ledger?: string;
  dryRun?: boolean;
}

export function toRunOptions(cli: CliOptions, cwd: string = process.cwd()): RunOptions {
  if (cli.withCcache && cli.withSccache) {
    throw new ConfigError('--with-ccache and --with-sccache are mutually exclusive');
  }
  const cacheTool = cli.withCcache ? 'ccache' : cli.withSccache ? 'sccache' : undefined;

  if (cli.cacheOnly && !cacheTool) {
    throw new ConfigError('--cache-only needs --with-ccache or --with-sccache');
  }
  if (!cli.cacheOnly && !cli.sourceDir) {
    throw new ConfigError('--source-dir is required unless --cache-only is given');
  }
  if (cli.jobs !== undefined && !/^\d+(,\d+)*$/.test(cli.jobs)) {
    throw new ConfigError(`Invalid parallelism "${cli.jobs}", expected N or N,M,...`);
  }

  const workspace = path.resolve(cwd, cli.workspace ?? '.');

  return {
    debug: cli.debug,
    sourceDir: path.resolve(cwd, cli.sourceDir ?? '.'),
    jobs: cli.jobs,
    keepLog: cli.keepLog,
    stopOnFirstFailure: cli.stopOnFirstFailure,
    withDiffoscope: cli.withDiffoscope,
    buildWithClang: cli.buildWithClang,
    sanitize: cli.sanitize,
    report: cli.report,
    cacheTool,
    cacheOnly: cli.cacheOnly,
    extraOpts: cli.extraOpts,
    extraOpts2: cli.extraOpts2,
    extraOpts3: cli.extraOpts3,
    extraVersionString: cli.extraVersionString,
    compressedCacheSize: cli.compressedCacheSize,
    timestampParams: cli.timestampParams,
    enableTests: cli.enableTests,
    separateDebPrep: cli.separateDebPrep,
    testsConf: cli.testsConf,
    template: cli.template,
    profile: cli.profile,
    namespace: cli.namespace,
    workspace,
    resultsDir: path.resolve(cwd, cli.resultsDir ?? path.join(os.homedir(), 'perftest-results')),
    ledger: path.resolve(cwd, cli.ledger ?? path.join(os.homedir(), 'buildtimes.csv')),
    dryRun: cli.dryRun,
  };
}

function printSummary(report: DriverReport): void {
  const results = report.results;
  const passed = results.filter(
    (r) => r.exitCode === 0 && (r.state === 'deleted' || r.state === 'succeeded'),
  ).length;
  const failed = results.filter((r) => r.exitCode !== 0).length;
  const skipped = results.filter((r) => r.state === 'skipped').length;
  const preserved = results.filter((r) => r.state === 'preserved').length;

  console.log('\n================');
  console.log('Summary');
  console.log('================');
  console.log(`Targets:   ${results.length}`);
  console.log(`Passed:    ${passed}`);
  console.log(`Failed:    ${failed}`);
  console.log(`Skipped:   ${skipped}`);
  console.log(`Preserved: ${preserved}`);
  console.log(`Time:      ${report.durationMs}ms`);
  console.log(`Status:    ${report.exitCode}`);
}

export interface ProgramDeps {
  backend?: ContainerBackend;
  exit?: (code: number) => void;
}

export function createProgram(deps: ProgramDeps = {}): Command {
  const program = new Command();
  const exit = deps.exit ?? ((code: number) => process.exit(code));

  program
    .name('accel-perftest')
    .description(
      'Build a build accelerator from source and time package builds with it in disposable containers',
    )
    .version(VERSION)
    .argument('[targets...]', 'Targets to run, each name[:type[:timeoutMinutes]]')
    .option('-d, --debug', 'Debug run: forward -d to the runner and skip measurement collection')
    .option('-f, --source-dir <dir>', "Accelerator's source tree")
    .option('-j, --jobs <spec>', 'Parallelism level, or a comma-separated list of levels')
    .option('--keep-log', 'Keep transcripts of successful targets')
    .option('--stop-on-first-failure', 'Stop after a target fails with the accelerator running')
    .option('--with-diffoscope', 'Compare build results with diffoscope')
    .option('--build-with-clang', 'Build the accelerator with clang')
    .option('--sanitize', 'Build the accelerator with ASan and UBSan')
    .option('-r, --report', 'Collect HTML reports')
    .addOption(new Option('--with-ccache', 'Measure with ccache').conflicts('withSccache'))
    .addOption(new Option('--with-sccache', 'Measure with sccache').conflicts('withCcache'))
    .option('--cache-only', 'Measure only the compiler cache, without building the accelerator')
    .option('--extra-opts <opts>', 'Extra accelerator options')
    .option('--extra-opts2 <opts>', 'Second set of extra accelerator options')
    .option('--extra-opts3 <opts>', 'Third set of extra accelerator options')
    .option('--extra-version-string <suffix>', 'Suffix for the accelerator package version')
    .option('--compressed-cache-size', 'Measure the compressed cache size')
    .option('--timestamp-params <params>', 'Parameters for timestamping runner output')
    .option('--enable-tests', "Run the packages' test suites")
    .option('--separate-deb-prep', 'Prepare the package build in a separate step')
    .option('--tests-conf <file>', 'Target configuration, relative to the workspace', 'tests.json')
    .option('--template <image>', 'Template image for instances', 'perftest-template')
    .option('--profile <profile>', 'Container profile to launch instances with')
    .option('--namespace <prefix>', 'Prefix for instance names', 'perftest')
    .option('--workspace <dir>', 'Directory pushed into each instance (contains the runner)')
    .option('--results-dir <dir>', 'Where transcripts and reports are written (default: ~/perftest-results)')
    .option('--ledger <file>', 'Host-side timing ledger (default: ~/buildtimes.csv)')
    .option('--dry-run', 'Resolve targets and skip decisions without touching containers')
    .action(async (targets: string[], cli: CliOptions) => {
      try {
        const options = toRunOptions(cli);

        let backend = deps.backend;
        if (!backend) {
          const tool = probeBackendTool();
          if (!tool && !options.dryRun) {
            console.error('Error: neither incus nor lxc was found in PATH');
            exit(1);
            return;
          }
          backend = new CliBackend(tool ?? 'incus');
        }

        console.log(`\naccel-perftest v${VERSION}`);
        console.log(`================`);
        console.log(`Backend: ${backend.tool}`);
        console.log(`Workspace: ${options.workspace}`);
        if (!options.cacheOnly) {
          console.log(`Accelerator source: ${options.sourceDir}`);
        }

        const report = await runPerfTests(options, targets, { backend });
        printSummary(report);

        exit(Math.min(report.exitCode, 255));
      } catch (error) {
        console.error('Error:', error instanceof Error ? error.message : error);
        exit(1);
      }
    });

  return program;
}
