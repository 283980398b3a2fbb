import type { ProcessRunner } from './process.js';

export interface SourceRevision {
  describe: string;
  authorDate: string;
}

/**
 * Turn `git describe --tags --always --long` output into a Debian
 * version: v1.2.3-4-gabc1234 becomes 1.2.3+git4.gabc1234, a bare hash
 * becomes 0~git.<hash>. A tag such as release-1.0 loses its non-numeric
 * prefix. The optional suffix is appended after a `+`.
 */
export function deriveVersion(describe: string, suffix?: string): string {
  const trimmed = describe.trim();
  const match = /^v?(.+)-(\d+)-g([0-9a-f]+)$/.exec(trimmed);

  let version: string;
  if (match) {
    const [, tag, count, hash] = match;
    const cleanTag = tag.replace(/[^A-Za-z0-9.+~]+/g, '.');
    // Debian upstream versions must start with a digit
    const upstream = cleanTag.replace(/^[^0-9]+/, '') || `0~${cleanTag}`;
    version = `${upstream}+git${count}.g${hash}`;
  } else if (/^[0-9a-f]+$/.test(trimmed)) {
    version = `0~git.${trimmed}`;
  } else {
    throw new Error(`Unexpected describe output: "${trimmed}"`);
  }

  const cleanSuffix = suffix?.replace(/[^A-Za-z0-9.~]+/g, '.').replace(/^\.+|\.+$/g, '');
  return cleanSuffix ? `${version}+${cleanSuffix}` : version;
}

/**
 * New top entry for debian/changelog, dated with the commit's author
 * date so rebuilt packages of the same commit are identical.
 */
export function changelogEntry(
  packageName: string,
  version: string,
  authorDate: string,
  describe: string,
): string {
  return (
    `${packageName} (${version}) UNRELEASED; urgency=medium\n` +
    `\n` +
    `  * Performance test build of ${describe.trim()}\n` +
    `\n` +
    ` -- Performance Test <perftest@localhost>  ${authorDate.trim()}\n` +
    `\n`
  );
}

export function changelogPackageName(changelog: string): string {
  const match = /^(\S+)\s+\(/.exec(changelog);
  if (!match) {
    throw new Error('Cannot find the package name in debian/changelog');
  }
  return match[1];
}

export async function readSourceRevision(
  run: ProcessRunner,
  sourceDir: string,
): Promise<SourceRevision> {
  const describe = await run('git', ['-C', sourceDir, 'describe', '--tags', '--always', '--long'], {
    stdout: 'capture',
  });
  if (describe.exitCode !== 0) {
    throw new Error(`git describe failed in ${sourceDir} with status ${describe.exitCode}`);
  }

  const log = await run('git', ['-C', sourceDir, 'log', '-1', '--format=%aD'], {
    stdout: 'capture',
  });
  if (log.exitCode !== 0) {
    throw new Error(`git log failed in ${sourceDir} with status ${log.exitCode}`);
  }

  return { describe: describe.stdout.trim(), authorDate: log.stdout.trim() };
}
