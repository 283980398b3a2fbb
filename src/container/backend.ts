import type { Readable } from 'stream';

export interface ExecOptions {
  user?: string;
  cwd?: string;
  env?: Record<string, string>;
  input?: Readable | string;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
}

/**
 * Uniform surface over the container manager. Every call that can fail
 * reports the translated exit status of the underlying tool; the
 * provisioning helpers in this module turn a non-zero status into a
 * BackendError.
 */
export interface ContainerBackend {
  readonly tool: string;

  launch(templateImage: string, instance: string, profile?: string): Promise<number>;
  exec(instance: string, command: string[], options?: ExecOptions): Promise<number>;
  execCapture(instance: string, command: string[], options?: ExecOptions): Promise<CommandResult>;
  /** Run with output recorded byte-for-byte into transcriptPath on the host. */
  execRecorded(
    instance: string,
    command: string[],
    transcriptPath: string,
    options?: ExecOptions,
  ): Promise<number>;
  pushTree(instance: string, localPath: string, remotePath: string): Promise<number>;
  pullTree(instance: string, remotePath: string, localPath: string): Promise<number>;
  pullFile(instance: string, remotePath: string, localPath: string): Promise<number>;
  stop(instance: string): Promise<number>;
  delete(instance: string): Promise<number>;
  rename(instance: string, newName: string): Promise<number>;
  exists(instance: string): Promise<boolean>;
  setCpuLimit(instance: string, coreRange: string): Promise<number>;
}

export class BackendError extends Error {
  constructor(
    readonly operation: string,
    readonly instance: string,
    readonly exitCode: number,
  ) {
    super(`${operation} on ${instance} failed with status ${exitCode}`);
    this.name = 'BackendError';
  }
}

export async function check(
  operation: string,
  instance: string,
  status: Promise<number>,
): Promise<void> {
  const exitCode = await status;
  if (exitCode !== 0) {
    throw new BackendError(operation, instance, exitCode);
  }
}

/**
 * Stop and delete an instance if it exists. Safe to call for names that
 * were never created.
 */
export async function removeInstance(
  backend: ContainerBackend,
  instance: string,
): Promise<void> {
  if (!(await backend.exists(instance))) {
    return;
  }
  // Stopping an already stopped instance fails; delete is what must succeed
  await backend.stop(instance);
  await check('delete', instance, backend.delete(instance));
}

export async function fileExists(
  backend: ContainerBackend,
  instance: string,
  remotePath: string,
): Promise<boolean> {
  return (await backend.exec(instance, ['test', '-f', remotePath])) === 0;
}
