import * as fs from 'fs';
import * as path from 'path';
import type { CommandResult, ContainerBackend, ExecOptions } from './backend.js';
import { runProcess, type ProcessRunner } from '../utils/process.js';
import { shellJoin } from '../utils/shell.js';
import { extractTo, packDirectory } from '../utils/tar.js';

// incus is the maintained fork and wins when both are installed
export const BACKEND_TOOLS = ['incus', 'lxc'] as const;

export type BackendTool = (typeof BACKEND_TOOLS)[number];

function isExecutableFile(candidate: string): boolean {
  try {
    fs.accessSync(candidate, fs.constants.X_OK);
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

export function findExecutable(
  name: string,
  searchPath: string = process.env.PATH ?? '',
): string | null {
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, name);
    if (isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return null;
}

/**
 * Pick the container manager once, at start-up.
 * @returns The tool name, or null when neither is installed
 */
export function probeBackendTool(searchPath?: string): BackendTool | null {
  for (const tool of BACKEND_TOOLS) {
    if (findExecutable(tool, searchPath)) {
      return tool;
    }
  }
  return null;
}

/**
 * Drives incus or lxc through their command-line clients. Both accept
 * the same verbs and flags for everything used here.
 */
export class CliBackend implements ContainerBackend {
  constructor(
    readonly tool: BackendTool,
    private run: ProcessRunner = runProcess,
  ) {}

  execArgs(instance: string, command: string[], options: ExecOptions = {}): string[] {
    const args = ['exec', instance];
    if (options.cwd) {
      args.push('--cwd', options.cwd);
    }
    for (const [key, value] of Object.entries(options.env ?? {})) {
      args.push('--env', `${key}=${value}`);
    }
    args.push('--');
    if (options.user) {
      args.push('runuser', '-u', options.user, '--');
    }
    return [...args, ...command];
  }

  private async status(args: string[], options: ExecOptions = {}): Promise<number> {
    const result = await this.run(this.tool, args, { input: options.input });
    return result.exitCode;
  }

  async launch(templateImage: string, instance: string, profile?: string): Promise<number> {
    const args = ['launch', templateImage, instance];
    if (profile) {
      args.push('--profile', profile);
    }
    return this.status(args);
  }

  async exec(instance: string, command: string[], options: ExecOptions = {}): Promise<number> {
    return this.status(this.execArgs(instance, command, options), options);
  }

  async execCapture(
    instance: string,
    command: string[],
    options: ExecOptions = {},
  ): Promise<CommandResult> {
    const result = await this.run(this.tool, this.execArgs(instance, command, options), {
      input: options.input,
      stdout: 'capture',
    });
    return { exitCode: result.exitCode, stdout: result.stdout };
  }

  async execRecorded(
    instance: string,
    command: string[],
    transcriptPath: string,
    options: ExecOptions = {},
  ): Promise<number> {
    const inner = shellJoin([this.tool, ...this.execArgs(instance, command, options)]);
    // --return makes script exit with the child's status instead of its own
    const result = await this.run('script', [
      '--quiet',
      '--return',
      '--command',
      inner,
      transcriptPath,
    ]);
    return result.exitCode;
  }

  async pushTree(instance: string, localPath: string, remotePath: string): Promise<number> {
    const mkdir = await this.exec(instance, ['mkdir', '-p', remotePath]);
    if (mkdir !== 0) {
      return mkdir;
    }
    return this.exec(instance, ['tar', '-x', '-f', '-', '-C', remotePath], {
      input: packDirectory(localPath),
    });
  }

  async pullTree(instance: string, remotePath: string, localPath: string): Promise<number> {
    const extraction = extractTo(localPath);
    const result = await this.run(
      this.tool,
      this.execArgs(instance, ['tar', '-c', '-f', '-', '-C', remotePath, '.']),
      { stdout: extraction.stream },
    );
    if (result.exitCode !== 0) {
      extraction.stream.destroy();
      await extraction.done;
      return result.exitCode;
    }
    await extraction.done;
    return 0;
  }

  async pullFile(instance: string, remotePath: string, localPath: string): Promise<number> {
    return this.status(['file', 'pull', `${instance}${remotePath}`, localPath]);
  }

  async stop(instance: string): Promise<number> {
    return this.status(['stop', instance, '--force']);
  }

  async delete(instance: string): Promise<number> {
    return this.status(['delete', instance, '--force']);
  }

  async rename(instance: string, newName: string): Promise<number> {
    return this.status(['rename', instance, newName]);
  }

  async exists(instance: string): Promise<boolean> {
    const result = await this.run(this.tool, ['info', instance], { stdout: 'capture' });
    return result.exitCode === 0;
  }

  async setCpuLimit(instance: string, coreRange: string): Promise<number> {
    return this.status(['config', 'set', instance, 'limits.cpu', coreRange]);
  }
}
