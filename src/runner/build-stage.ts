import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { BuildOutcome } from '../types.js';
import {
  BackendError,
  check,
  removeInstance,
  type ContainerBackend,
} from '../container/backend.js';
import { buildInstanceName } from '../container/naming.js';
import type { ProcessRunner } from '../utils/process.js';
import {
  changelogEntry,
  changelogPackageName,
  deriveVersion,
  readSourceRevision,
  type SourceRevision,
} from '../utils/version.js';

const REMOTE_SOURCE = '/root/accelerator';
const REMOTE_OUTPUT = '/root/packages';

// Appended to debian/rules. The bundled allocator replaces malloc, which
// ASan must own, so it is switched off together with enabling sanitizers.
export const SANITIZER_RULES_HOOK = `
override_dh_auto_configure:
\tdh_auto_configure -- -DENABLE_JEMALLOC=OFF -DSANITIZE=ON \\
\t\t-DCMAKE_C_FLAGS="-fsanitize=address,undefined -fno-omit-frame-pointer" \\
\t\t-DCMAKE_CXX_FLAGS="-fsanitize=address,undefined -fno-omit-frame-pointer"
`;

export interface BuildStageOptions {
  sourceDir: string;
  template: string;
  profile?: string;
  namespace: string;
  buildWithClang?: boolean;
  sanitize?: boolean;
  versionSuffix?: string;
}

export class BuildStage {
  constructor(
    private backend: ContainerBackend,
    private run: ProcessRunner,
  ) {}

  async build(options: BuildStageOptions): Promise<BuildOutcome> {
    const instance = buildInstanceName(options.namespace);
    console.log(`\nBuilding accelerator from ${options.sourceDir} in ${instance}`);

    try {
      const revision = await readSourceRevision(this.run, options.sourceDir);
      const version = deriveVersion(revision.describe, options.versionSuffix);
      console.log(`  Version: ${version}`);

      await removeInstance(this.backend, instance);
      await check(
        'launch',
        instance,
        this.backend.launch(options.template, instance, options.profile),
      );

      const dir = await this.buildInInstance(instance, options, version, revision);
      console.log(`  ✓ Packages ready in ${dir}`);
      return {
        kind: 'built',
        artifacts: { dir, version, timestamp: revision.authorDate },
      };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      console.log(`  ✗ BUILD FAILED: ${errorMessage}`);
      return {
        kind: 'failed',
        exitCode: error instanceof BackendError ? error.exitCode : 1,
        error: errorMessage,
      };
    } finally {
      await this.cleanup(instance);
    }
  }

  private async buildInInstance(
    instance: string,
    options: BuildStageOptions,
    version: string,
    revision: SourceRevision,
  ): Promise<string> {
    const backend = this.backend;

    await check(
      'push source',
      instance,
      backend.pushTree(instance, options.sourceDir, REMOTE_SOURCE),
    );

    await check('apt-get update', instance, backend.exec(instance, ['apt-get', 'update']));
    await check(
      'install build tools',
      instance,
      backend.exec(instance, [
        'apt-get',
        'install',
        '-y',
        'devscripts',
        'equivs',
        ...(options.buildWithClang ? ['clang'] : []),
      ]),
    );
    await check(
      'install build dependencies',
      instance,
      backend.exec(instance, ['apt-get', 'build-dep', '-y', REMOTE_SOURCE]),
    );

    const changelog = await backend.execCapture(instance, [
      'cat',
      `${REMOTE_SOURCE}/debian/changelog`,
    ]);
    if (changelog.exitCode !== 0) {
      throw new BackendError('read changelog', instance, changelog.exitCode);
    }
    const entry = changelogEntry(
      changelogPackageName(changelog.stdout),
      version,
      revision.authorDate,
      revision.describe,
    );
    await check(
      'write changelog',
      instance,
      backend.exec(instance, ['sh', '-c', `cat > ${REMOTE_SOURCE}/debian/changelog`], {
        input: entry + changelog.stdout,
      }),
    );

    if (options.sanitize) {
      await check(
        'patch rules for sanitizers',
        instance,
        backend.exec(instance, ['sh', '-c', `cat >> ${REMOTE_SOURCE}/debian/rules`], {
          input: SANITIZER_RULES_HOOK,
        }),
      );
    }

    const env: Record<string, string> = { DEB_BUILD_OPTIONS: 'nocheck' };
    if (options.buildWithClang) {
      env.CC = 'clang';
      env.CXX = 'clang++';
    }
    await check(
      'dpkg-buildpackage',
      instance,
      backend.exec(instance, ['dpkg-buildpackage', '-b', '-uc', '-us'], {
        cwd: REMOTE_SOURCE,
        env,
      }),
    );

    await check(
      'collect packages',
      instance,
      backend.exec(instance, [
        'sh',
        '-c',
        `mkdir -p ${REMOTE_OUTPUT} && mv /root/*.deb ${REMOTE_OUTPUT}/`,
      ]),
    );

    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'accel-perftest-debs-'));
    try {
      await check('pull packages', instance, backend.pullTree(instance, REMOTE_OUTPUT, dir));
    } catch (error) {
      fs.rmSync(dir, { recursive: true, force: true });
      throw error;
    }
    return dir;
  }

  private async cleanup(instance: string): Promise<void> {
    try {
      await removeInstance(this.backend, instance);
    } catch (error) {
      console.warn(
        `  Warning: failed to remove ${instance}:`,
        error instanceof Error ? error.message : error,
      );
    }
  }
}
