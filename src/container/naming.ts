import { createHash } from 'crypto';

// Instance names are limited to 63 characters of letters, digits and dashes
export const MAX_INSTANCE_NAME_LENGTH = 63;

const FAILED_MARKER = 'FAILED';

export function sanitizeName(name: string): string {
  return name.replace(/[^A-Za-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
}

function truncate(name: string, length: number): string {
  return name.slice(0, length).replace(/-+$/, '');
}

const DIGEST_LENGTH = 8;

/**
 * Deterministic instance name for a target. Reruns of the same target
 * land on the same name, which is what lets a stale instance be found
 * and removed before provisioning. Names too long for the limit are cut
 * and end in a digest of the full name, so long targets sharing a prefix
 * stay apart.
 */
export function instanceName(namespace: string, target: string): string {
  const sanitized = sanitizeName(target);
  if (!sanitized) {
    throw new Error(`Target name has no usable characters: "${target}"`);
  }
  const full = `${sanitizeName(namespace)}-${sanitized}`;
  if (full.length <= MAX_INSTANCE_NAME_LENGTH) {
    return full;
  }
  const digest = createHash('sha256').update(full).digest('hex').slice(0, DIGEST_LENGTH);
  return `${truncate(full, MAX_INSTANCE_NAME_LENGTH - DIGEST_LENGTH - 1)}-${digest}`;
}

// A double dash never survives sanitizeName, so no target can map here.
export function buildInstanceName(namespace: string): string {
  return `${sanitizeName(namespace)}--build`;
}

export function failedInstanceName(name: string, timestamp: string): string {
  const suffix = `-${FAILED_MARKER}-${timestamp}`;
  return truncate(name, MAX_INSTANCE_NAME_LENGTH - suffix.length) + suffix;
}
