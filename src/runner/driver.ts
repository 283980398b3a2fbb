import * as fs from 'fs';
import * as path from 'path';
import type { BuildOutcome, RunOptions, SchedulerReport } from '../types.js';
import type { ContainerBackend } from '../container/backend.js';
import { runProcess, type ProcessRunner } from '../utils/process.js';
import { ConfigError, loadRunConfig } from '../utils/run-config.js';
import { loadSkipPolicies, type SkipPolicies } from '../utils/skip-policy.js';
import { resolveTargets } from '../utils/target-spec.js';
import { BuildStage } from './build-stage.js';
import { TestScheduler } from './scheduler.js';

export interface DriverDeps {
  backend: ContainerBackend;
  run?: ProcessRunner;
  policies?: SkipPolicies;
  now?: () => Date;
}

export interface DriverReport extends SchedulerReport {
  buildFailed: boolean;
}

function validateSourceDir(sourceDir: string): void {
  if (!fs.existsSync(sourceDir)) {
    throw new ConfigError(`Source directory does not exist: ${sourceDir}`);
  }
  if (!fs.statSync(sourceDir).isDirectory()) {
    throw new ConfigError(`Source path is not a directory: ${sourceDir}`);
  }
}

/**
 * Build the accelerator once, then run every target against it.
 * @param explicitTargets Command-line targets; empty runs the whole configuration
 */
export async function runPerfTests(
  options: RunOptions,
  explicitTargets: string[],
  deps: DriverDeps,
): Promise<DriverReport> {
  const startTime = Date.now();

  if (!options.cacheOnly) {
    validateSourceDir(options.sourceDir);
  }

  const config = loadRunConfig(path.resolve(options.workspace, options.testsConf));
  const targets = resolveTargets(config, explicitTargets);
  const policies = deps.policies ?? loadSkipPolicies();
  const scheduler = new TestScheduler(deps.backend, options, policies, deps.now);

  console.log(`Targets: ${targets.length}`);

  if (options.dryRun) {
    const report = await scheduler.runAll(targets);
    return { ...report, buildFailed: false };
  }

  const outcome: BuildOutcome = options.cacheOnly
    ? { kind: 'not-requested' }
    : await new BuildStage(deps.backend, deps.run ?? runProcess).build({
        sourceDir: options.sourceDir,
        template: options.template,
        profile: options.profile,
        namespace: options.namespace,
        buildWithClang: options.buildWithClang,
        sanitize: options.sanitize,
        versionSuffix: options.extraVersionString,
      });

  if (outcome.kind === 'failed') {
    console.error('Error: building the accelerator failed, no targets were run');
    return {
      exitCode: Math.max(outcome.exitCode, 1),
      results: [],
      halted: true,
      durationMs: Date.now() - startTime,
      buildFailed: true,
    };
  }

  const artifacts = outcome.kind === 'built' ? outcome.artifacts : undefined;

  try {
    const report = await scheduler.runAll(targets, artifacts);
    return { ...report, durationMs: Date.now() - startTime, buildFailed: false };
  } finally {
    if (artifacts) {
      fs.rmSync(artifacts.dir, { recursive: true, force: true });
    }
  }
}
