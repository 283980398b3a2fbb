import { describe, it, expect } from 'vitest';
import { buildRunnerArgs } from '../../src/utils/runner-args.js';
import type { RunOptions, Target } from '../../src/types.js';

const base: RunOptions = {
  sourceDir: '/src/accelerator',
  testsConf: 'tests.json',
  template: 'perftest-template',
  namespace: 'perftest',
  workspace: '/work',
  resultsDir: '/results',
  ledger: '/ledger.csv',
};

const json4s: Target = { name: 'json4s', deps: [], options: {} };

describe('buildRunnerArgs', () => {
  it('passes only the configuration file and target by default', () => {
    expect(buildRunnerArgs(base, json4s)).toEqual(['--tests-conf=tests.json', 'json4s']);
  });

  it('forwards every run option', () => {
    const args = buildRunnerArgs(
      {
        ...base,
        debug: true,
        jobs: '3',
        withDiffoscope: true,
        cacheTool: 'ccache',
        cacheOnly: true,
        extraOpts: '-d time',
        extraOpts2: '-g -s',
        extraOpts3: '-i',
        extraVersionString: 'options-test',
        compressedCacheSize: true,
        timestampParams: '-i %.S',
        enableTests: true,
        separateDebPrep: true,
      },
      { name: 'zlib', type: 'cmake', timeout: 30, deps: ['cmake'], options: {} },
    );

    expect(args).toEqual([
      '-d',
      '-j',
      '3',
      '--with-diffoscope',
      '--with-ccache',
      '--cache-only',
      '--extra-opts=-d time',
      '--extra-opts2=-g -s',
      '--extra-opts3=-i',
      '--extra-version-string=options-test',
      '--compressed-cache-size',
      '--timestamp-params=-i %.S',
      '--enable-tests',
      '--separate-deb-prep',
      '--tests-conf=tests.json',
      'zlib:cmake:30',
    ]);
  });

  it('forwards sccache and leaves per-target options to the tests configuration', () => {
    const args = buildRunnerArgs(
      { ...base, cacheTool: 'sccache' },
      { name: 'json4s', deps: [], options: { flavor: 'static' } },
    );

    expect(args).toEqual(['--with-sccache', '--tests-conf=tests.json', 'json4s']);
  });
});
