import * as fs from 'fs';
import * as path from 'path';
import type {
  BuildArtifactSet,
  RunOptions,
  SchedulerReport,
  Target,
  TargetResult,
} from '../types.js';
import {
  BackendError,
  check,
  removeInstance,
  type ContainerBackend,
} from '../container/backend.js';
import { failedInstanceName, instanceName } from '../container/naming.js';
import { skipReason, type SkipPolicies } from '../utils/skip-policy.js';
import { buildRunnerArgs, REMOTE_WORKSPACE, RUNNER_PATH } from '../utils/runner-args.js';
import { formatTimestamp } from '../utils/timestamp.js';
import { ArtifactCollector } from './artifacts.js';

const REMOTE_PACKAGES = '/root/accelerator-packages';

/**
 * CPU range to pin an instance to. Only a single concrete level is
 * pinned; the default (all host cores) and lists of levels run unpinned.
 */
export function cpuPinRange(jobs: string | undefined): string | null {
  if (!jobs || !/^\d+$/.test(jobs)) {
    return null;
  }
  const count = Number(jobs);
  if (count < 1) {
    return null;
  }
  return count === 1 ? '0' : `0-${count - 1}`;
}

function transcriptBaseName(target: string): string {
  return target.replace(/[/\\]/g, '_');
}

export class TestScheduler {
  private collector: ArtifactCollector;

  constructor(
    private backend: ContainerBackend,
    private options: RunOptions,
    private policies: SkipPolicies,
    private now: () => Date = () => new Date(),
  ) {
    this.collector = new ArtifactCollector(backend, options.ledger, options.resultsDir);
  }

  async runAll(targets: Target[], artifacts?: BuildArtifactSet): Promise<SchedulerReport> {
    const startTime = Date.now();
    const results: TargetResult[] = [];
    let exitCode = 0;
    let halted = false;

    for (let i = 0; i < targets.length; i++) {
      const target = targets[i];
      console.log(`\n[${i + 1}/${targets.length}] Running: ${target.name}`);

      const reason = skipReason(this.policies, target.name, {
        jobs: this.options.jobs,
        enableTests: this.options.enableTests,
      });

      if (reason) {
        console.log(`  - SKIPPED (${reason})`);
        results.push({
          target: target.name,
          state: 'skipped',
          exitCode: 0,
          started: false,
          reports: [],
          ledgerRows: 0,
          skipReason: reason,
          durationMs: 0,
        });
        continue;
      }

      if (this.options.dryRun) {
        console.log(`  [DRY RUN] would run in ${instanceName(this.options.namespace, target.name)}`);
        results.push({
          target: target.name,
          state: 'pending',
          exitCode: 0,
          started: false,
          reports: [],
          ledgerRows: 0,
          durationMs: 0,
        });
        continue;
      }

      const result = await this.runTarget(target, artifacts);
      results.push(result);
      exitCode = Math.max(exitCode, result.exitCode);
      this.printResult(result);

      if (this.options.stopOnFirstFailure && this.haltsRun(result)) {
        console.log('\nStopping after first failure');
        halted = true;
        break;
      }
    }

    return { exitCode, results, halted, durationMs: Date.now() - startTime };
  }

  private haltsRun(result: TargetResult): boolean {
    return (
      result.exitCode !== 0 &&
      (result.state === 'preserved' || result.failedDuring === 'provisioning')
    );
  }

  private printResult(result: TargetResult): void {
    if (result.exitCode === 0) {
      console.log(`  ✓ PASSED (${result.durationMs}ms)`);
      return;
    }
    const detail = result.error ? `: ${result.error}` : '';
    console.log(`  ✗ FAILED with status ${result.exitCode}${detail}`);
    if (result.state === 'preserved') {
      console.log(`    Container kept as ${result.instance}`);
    }
    if (result.transcript) {
      console.log(`    Transcript: ${result.transcript}`);
    }
  }

  async runTarget(target: Target, artifacts?: BuildArtifactSet): Promise<TargetResult> {
    const startTime = Date.now();
    const instance = instanceName(this.options.namespace, target.name);
    const timestamp = formatTimestamp(this.now());
    const result: TargetResult = {
      target: target.name,
      state: 'provisioning',
      exitCode: 0,
      started: false,
      instance,
      reports: [],
      ledgerRows: 0,
      durationMs: 0,
    };

    fs.mkdirSync(this.options.resultsDir, { recursive: true });
    const transcript = path.join(
      this.options.resultsDir,
      `${transcriptBaseName(target.name)}-${timestamp}.log`,
    );

    try {
      await this.provision(instance, target, artifacts);

      result.state = 'running';
      result.exitCode = await this.backend.execRecorded(
        instance,
        [RUNNER_PATH, ...buildRunnerArgs(this.options, target)],
        transcript,
        { cwd: REMOTE_WORKSPACE },
      );
      result.state = result.exitCode === 0 ? 'succeeded' : 'failed';
      result.started = await this.collector.acceleratorStarted(instance);
    } catch (error) {
      await this.abort(instance, transcript, error, result);
      result.durationMs = Date.now() - startTime;
      return result;
    }

    if (!this.options.debug) {
      await this.collect(instance, target, timestamp, result);
    }
    await this.dispose(instance, transcript, timestamp, result);

    result.durationMs = Date.now() - startTime;
    return result;
  }

  private async provision(
    instance: string,
    target: Target,
    artifacts?: BuildArtifactSet,
  ): Promise<void> {
    const backend = this.backend;
    const options = this.options;

    await removeInstance(backend, instance);
    await check('launch', instance, backend.launch(options.template, instance, options.profile));

    const packages = [...target.deps];
    if (options.cacheTool === 'ccache') {
      packages.push('ccache');
    } else if (options.cacheTool === 'sccache') {
      packages.push('cargo');
    }

    if (packages.length > 0 || artifacts) {
      await check('apt-get update', instance, backend.exec(instance, ['apt-get', 'update']));
    }
    if (packages.length > 0) {
      await check(
        'install dependencies',
        instance,
        backend.exec(instance, ['apt-get', 'install', '-y', ...packages]),
      );
    }

    if (artifacts) {
      await check(
        'push packages',
        instance,
        backend.pushTree(instance, artifacts.dir, REMOTE_PACKAGES),
      );
      await check(
        'install packages',
        instance,
        backend.exec(instance, ['sh', '-c', `apt-get install -y ${REMOTE_PACKAGES}/*.deb`]),
      );
    }

    await check(
      'push workspace',
      instance,
      backend.pushTree(instance, options.workspace, REMOTE_WORKSPACE),
    );

    if (options.cacheTool === 'sccache') {
      await check(
        'build sccache',
        instance,
        backend.exec(instance, ['cargo', 'install', '--locked', '--root', '/usr/local', 'sccache']),
      );
    }

    const range = cpuPinRange(options.jobs);
    if (range) {
      await check('pin cpus', instance, backend.setCpuLimit(instance, range));
    }
  }

  // Missing or unreadable artifacts never change how the instance is disposed
  private async collect(
    instance: string,
    target: Target,
    timestamp: string,
    result: TargetResult,
  ): Promise<void> {
    try {
      result.ledgerRows = await this.collector.collectLedger(instance);
    } catch (error) {
      console.warn(
        `  Warning: could not append timings from ${instance}:`,
        error instanceof Error ? error.message : error,
      );
    }

    if (this.options.report) {
      try {
        result.reports = await this.collector.collectReports(instance, {
          target: transcriptBaseName(target.name),
          timestamp,
          failed: result.exitCode !== 0,
        });
      } catch (error) {
        console.warn(
          `  Warning: could not collect reports from ${instance}:`,
          error instanceof Error ? error.message : error,
        );
      }
    }
  }

  /**
   * A failure after the accelerator started is kept for inspection: the
   * transcript and the instance both get a FAILED marker. Everything
   * else is removed. The runner's status stands whatever happens here.
   */
  private async dispose(
    instance: string,
    transcript: string,
    timestamp: string,
    result: TargetResult,
  ): Promise<void> {
    if (result.exitCode !== 0 && result.started) {
      await this.preserve(instance, transcript, timestamp, result);
      return;
    }

    if (this.options.keepLog && fs.existsSync(transcript)) {
      result.transcript = transcript;
    } else {
      fs.rmSync(transcript, { force: true });
    }

    try {
      await check('delete', instance, this.backend.delete(instance));
      result.state = 'deleted';
    } catch (error) {
      console.warn(
        `  Warning: failed to remove ${instance}:`,
        error instanceof Error ? error.message : error,
      );
    }
  }

  // Never deletes: an instance that cannot be renamed stays under its own name
  private async preserve(
    instance: string,
    transcript: string,
    timestamp: string,
    result: TargetResult,
  ): Promise<void> {
    result.state = 'preserved';
    if (fs.existsSync(transcript)) {
      result.transcript = transcript;
    }

    try {
      const keptTranscript = transcript.replace(
        new RegExp(`-${timestamp}\\.log$`),
        `-FAILED-${timestamp}.log`,
      );
      if (fs.existsSync(transcript)) {
        fs.renameSync(transcript, keptTranscript);
        result.transcript = keptTranscript;
      }

      const preserved = failedInstanceName(instance, timestamp);
      await check('stop', instance, this.backend.stop(instance));
      await check('rename', instance, this.backend.rename(instance, preserved));
      result.instance = preserved;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      result.error = `could not preserve ${instance}: ${message}`;
      console.warn(`  Warning: ${instance} is kept under its own name: ${message}`);
    }
  }

  private async abort(
    instance: string,
    transcript: string,
    error: unknown,
    result: TargetResult,
  ): Promise<void> {
    result.failedDuring = result.state === 'provisioning' ? 'provisioning' : 'running';
    result.error = error instanceof Error ? error.message : String(error);
    if (result.exitCode === 0) {
      result.exitCode = error instanceof BackendError ? error.exitCode : 1;
    }

    if (this.options.keepLog && fs.existsSync(transcript)) {
      result.transcript = transcript;
    } else {
      fs.rmSync(transcript, { force: true });
    }

    try {
      await removeInstance(this.backend, instance);
      result.state = 'deleted';
    } catch (cleanupError) {
      result.state = 'failed';
      console.warn(
        `  Warning: failed to remove ${instance}:`,
        cleanupError instanceof Error ? cleanupError.message : cleanupError,
      );
    }
  }
}
