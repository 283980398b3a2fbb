import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  CliBackend,
  findExecutable,
  probeBackendTool,
} from '../../src/container/cli-backend.js';
import type { ProcessOptions, ProcessResult } from '../../src/utils/process.js';

interface RecordedRun {
  command: string;
  args: string[];
  options?: ProcessOptions;
}

function recordingRunner(exitCode = 0, stdout = '') {
  const runs: RecordedRun[] = [];
  const run = async (
    command: string,
    args: string[],
    options?: ProcessOptions,
  ): Promise<ProcessResult> => {
    runs.push({ command, args, options });
    return { exitCode, stdout, durationMs: 0 };
  };
  return { runs, run };
}

describe('probeBackendTool', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'accel-probe-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function install(dir: string, name: string): string {
    fs.mkdirSync(dir, { recursive: true });
    const file = path.join(dir, name);
    fs.writeFileSync(file, '#!/bin/sh\n', { mode: 0o755 });
    return file;
  }

  it('prefers incus when both tools are installed', () => {
    install(path.join(tempDir, 'a'), 'lxc');
    install(path.join(tempDir, 'b'), 'incus');

    const searchPath = [path.join(tempDir, 'a'), path.join(tempDir, 'b')].join(path.delimiter);

    expect(probeBackendTool(searchPath)).toBe('incus');
  });

  it('falls back to lxc', () => {
    install(tempDir, 'lxc');

    expect(probeBackendTool(tempDir)).toBe('lxc');
  });

  it('returns null when neither is installed', () => {
    expect(probeBackendTool(tempDir)).toBeNull();
  });

  it('ignores files that are not executable', () => {
    fs.writeFileSync(path.join(tempDir, 'incus'), 'not a program', { mode: 0o644 });

    expect(findExecutable('incus', tempDir)).toBeNull();
  });
});

describe('CliBackend', () => {
  it('launches from a template with an optional profile', async () => {
    const { runs, run } = recordingRunner();
    const backend = new CliBackend('incus', run);

    await backend.launch('perftest-template', 'pt-json4s');
    await backend.launch('perftest-template', 'pt-zlib', 'perf');

    expect(runs.map((r) => [r.command, ...r.args])).toEqual([
      ['incus', 'launch', 'perftest-template', 'pt-json4s'],
      ['incus', 'launch', 'perftest-template', 'pt-zlib', '--profile', 'perf'],
    ]);
  });

  it('builds exec arguments with cwd, environment and user', () => {
    const backend = new CliBackend('lxc');

    expect(
      backend.execArgs('pt-json4s', ['make', '-j4'], {
        cwd: '/root/src',
        env: { CC: 'clang' },
        user: 'ubuntu',
      }),
    ).toEqual([
      'exec',
      'pt-json4s',
      '--cwd',
      '/root/src',
      '--env',
      'CC=clang',
      '--',
      'runuser',
      '-u',
      'ubuntu',
      '--',
      'make',
      '-j4',
    ]);
  });

  it('returns the exit status of exec and forwards input', async () => {
    const { runs, run } = recordingRunner(4);
    const backend = new CliBackend('lxc', run);

    const status = await backend.exec('pt-a', ['sh', '-c', 'cat > /x'], { input: 'data' });

    expect(status).toBe(4);
    expect(runs[0].args).toEqual(['exec', 'pt-a', '--', 'sh', '-c', 'cat > /x']);
    expect(runs[0].options).toEqual({ input: 'data' });
  });

  it('captures output of execCapture', async () => {
    const { runs, run } = recordingRunner(0, 'a,b,c\n');
    const backend = new CliBackend('lxc', run);

    const result = await backend.execCapture('pt-a', ['cat', '/root/buildtimes.csv']);

    expect(result).toEqual({ exitCode: 0, stdout: 'a,b,c\n' });
    expect(runs[0].options?.stdout).toBe('capture');
  });

  it('records runner output through script', async () => {
    const { runs, run } = recordingRunner(1);
    const backend = new CliBackend('incus', run);

    const status = await backend.execRecorded(
      'pt-a',
      ['/root/perftest/inner', '--extra-opts=-d time', 'json4s'],
      '/results/json4s.log',
      { cwd: '/root/perftest' },
    );

    expect(status).toBe(1);
    expect(runs[0].command).toBe('script');
    expect(runs[0].args).toEqual([
      '--quiet',
      '--return',
      '--command',
      "incus exec pt-a --cwd /root/perftest -- /root/perftest/inner '--extra-opts=-d time' json4s",
      '/results/json4s.log',
    ]);
  });

  it('maps lifecycle verbs onto the tool', async () => {
    const { runs, run } = recordingRunner();
    const backend = new CliBackend('lxc', run);

    await backend.stop('pt-a');
    await backend.delete('pt-a');
    await backend.rename('pt-a', 'pt-a-FAILED-20261018-094501');
    await backend.setCpuLimit('pt-a', '0-3');
    await backend.pullFile('pt-a', '/root/report-1.html', '/results/r.html');

    expect(runs.map((r) => r.args)).toEqual([
      ['stop', 'pt-a', '--force'],
      ['delete', 'pt-a', '--force'],
      ['rename', 'pt-a', 'pt-a-FAILED-20261018-094501'],
      ['config', 'set', 'pt-a', 'limits.cpu', '0-3'],
      ['file', 'pull', 'pt-a/root/report-1.html', '/results/r.html'],
    ]);
  });

  it('reports existence from the info verb', async () => {
    expect(await new CliBackend('lxc', recordingRunner(0).run).exists('pt-a')).toBe(true);
    expect(await new CliBackend('lxc', recordingRunner(1).run).exists('pt-a')).toBe(false);
  });

  it('creates the remote directory before unpacking a pushed tree', async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'accel-push-'));
    try {
      fs.writeFileSync(path.join(tempDir, 'inner'), '#!/bin/sh\n');
      const { runs, run } = recordingRunner();
      const backend = new CliBackend('lxc', run);

      const status = await backend.pushTree('pt-a', tempDir, '/root/perftest');

      expect(status).toBe(0);
      expect(runs.map((r) => r.args)).toEqual([
        ['exec', 'pt-a', '--', 'mkdir', '-p', '/root/perftest'],
        ['exec', 'pt-a', '--', 'tar', '-x', '-f', '-', '-C', '/root/perftest'],
      ]);
      expect(runs[1].options?.input).toBeDefined();
    } finally {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });

  it('stops pushing when the remote directory cannot be created', async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'accel-push-'));
    try {
      const { runs, run } = recordingRunner(2);
      const backend = new CliBackend('lxc', run);

      expect(await backend.pushTree('pt-a', tempDir, '/root/perftest')).toBe(2);
      expect(runs).toHaveLength(1);
    } finally {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });
});
