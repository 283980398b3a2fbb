export type CacheTool = 'ccache' | 'sccache';

export type TargetState =
  | 'pending'
  | 'skipped'
  | 'provisioning'
  | 'running'
  | 'succeeded'
  | 'failed'
  | 'deleted'
  | 'preserved';

export interface Target {
  name: string;
  type?: string;
  timeout?: number;
  deps: string[];
  options: Record<string, string>;
}

export interface TargetResult {
  target: string;
  state: TargetState;
  exitCode: number;
  started: boolean;
  instance?: string;
  transcript?: string;
  reports: string[];
  ledgerRows: number;
  skipReason?: string;
  failedDuring?: 'provisioning' | 'running';
  error?: string;
  durationMs: number;
}

export interface SchedulerReport {
  exitCode: number;
  results: TargetResult[];
  halted: boolean;
  durationMs: number;
}

export interface BuildArtifactSet {
  dir: string;
  version: string;
  timestamp: string;
}

export type BuildOutcome =
  | { kind: 'built'; artifacts: BuildArtifactSet }
  | { kind: 'failed'; exitCode: number; error?: string }
  | { kind: 'not-requested' };

export interface RunOptions {
  debug?: boolean;
  sourceDir: string;
  jobs?: string;
  keepLog?: boolean;
  stopOnFirstFailure?: boolean;
  withDiffoscope?: boolean;
  buildWithClang?: boolean;
  sanitize?: boolean;
  report?: boolean;
  cacheTool?: CacheTool;
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
  workspace: string;
  resultsDir: string;
  ledger: string;
  dryRun?: boolean;
}
