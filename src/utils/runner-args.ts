import type { RunOptions, Target } from '../types.js';
import { formatTargetSpec } from './target-spec.js';

// Where the workspace tree lands inside each instance
export const REMOTE_WORKSPACE = '/root/perftest';
export const RUNNER_PATH = `${REMOTE_WORKSPACE}/inner`;

/**
 * Argument line for the in-container runner. Run options are forwarded
 * unchanged; the target spec goes last.
 */
export function buildRunnerArgs(options: RunOptions, target: Target): string[] {
  const args: string[] = [];

  if (options.debug) args.push('-d');
  if (options.jobs) args.push('-j', options.jobs);
  if (options.withDiffoscope) args.push('--with-diffoscope');
  if (options.cacheTool === 'ccache') args.push('--with-ccache');
  if (options.cacheTool === 'sccache') args.push('--with-sccache');
  if (options.cacheOnly) args.push('--cache-only');
  if (options.extraOpts) args.push(`--extra-opts=${options.extraOpts}`);
  if (options.extraOpts2) args.push(`--extra-opts2=${options.extraOpts2}`);
  if (options.extraOpts3) args.push(`--extra-opts3=${options.extraOpts3}`);
  if (options.extraVersionString) {
    args.push(`--extra-version-string=${options.extraVersionString}`);
  }
  if (options.compressedCacheSize) args.push('--compressed-cache-size');
  if (options.timestampParams) args.push(`--timestamp-params=${options.timestampParams}`);
  if (options.enableTests) args.push('--enable-tests');
  if (options.separateDebPrep) args.push('--separate-deb-prep');
  // The runner reads per-target options from the tests configuration itself
  args.push(`--tests-conf=${options.testsConf}`);

  args.push(formatTargetSpec(target));
  return args;
}
