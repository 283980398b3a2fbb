import * as fs from 'fs';
import * as path from 'path';
import { fileExists, type ContainerBackend } from '../container/backend.js';

export const REMOTE_LEDGER = '/root/buildtimes.csv';
export const REMOTE_STARTED_SENTINEL = '/root/accelerator-started';
export const REMOTE_REPORTS = ['/root/report-1.html', '/root/report-2.html'];

export interface ReportNaming {
  target: string;
  timestamp: string;
  failed: boolean;
}

export function reportFileName(naming: ReportNaming, index: number): string {
  const marker = naming.failed ? '-FAILED' : '';
  return `${naming.target}-${naming.timestamp}${marker}-report-${index}.html`;
}

/**
 * Pulls measurement artifacts out of an instance. Anything the runner did
 * not produce is skipped without complaint.
 */
export class ArtifactCollector {
  constructor(
    private backend: ContainerBackend,
    private ledgerPath: string,
    private resultsDir: string,
  ) {}

  /**
   * Append the instance's ledger to the host ledger unchanged, except
   * that a missing final newline is added so the next run's rows start
   * on a line of their own.
   * @returns Number of rows appended
   */
  async collectLedger(instance: string): Promise<number> {
    const result = await this.backend.execCapture(instance, ['cat', REMOTE_LEDGER]);
    if (result.exitCode !== 0 || result.stdout === '') {
      return 0;
    }

    const content = result.stdout.endsWith('\n') ? result.stdout : `${result.stdout}\n`;
    fs.mkdirSync(path.dirname(this.ledgerPath), { recursive: true });
    fs.appendFileSync(this.ledgerPath, content);
    return content.split('\n').filter((line) => line.trim() !== '').length;
  }

  async collectReports(instance: string, naming: ReportNaming): Promise<string[]> {
    const collected: string[] = [];
    fs.mkdirSync(this.resultsDir, { recursive: true });

    for (const [i, remotePath] of REMOTE_REPORTS.entries()) {
      if (!(await fileExists(this.backend, instance, remotePath))) {
        continue;
      }
      const localPath = path.join(this.resultsDir, reportFileName(naming, i + 1));
      const status = await this.backend.pullFile(instance, remotePath, localPath);
      if (status === 0) {
        collected.push(localPath);
      } else {
        console.warn(`  Warning: could not pull ${remotePath} (status ${status})`);
      }
    }

    return collected;
  }

  async acceleratorStarted(instance: string): Promise<boolean> {
    return fileExists(this.backend, instance, REMOTE_STARTED_SENTINEL);
  }
}
