import type { Target } from '../types.js';
import { ConfigError, toTarget, type RunConfig } from './run-config.js';

export interface TargetSpec {
  name: string;
  type?: string;
  timeout?: number;
}

/**
 * Parse a command-line target of the form name[:type[:timeoutMinutes]].
 * Empty fields fall back to the configured values.
 */
export function parseTargetSpec(spec: string): TargetSpec {
  const [name, type, timeout, ...rest] = spec.split(':');
  if (!name || rest.length > 0) {
    throw new ConfigError(`Invalid target "${spec}", expected name[:type[:timeout]]`);
  }

  const result: TargetSpec = { name };
  if (type) {
    result.type = type;
  }
  if (timeout) {
    if (!/^\d+$/.test(timeout) || Number(timeout) === 0) {
      throw new ConfigError(`Invalid timeout in target "${spec}": ${timeout}`);
    }
    result.timeout = Number(timeout);
  }
  return result;
}

export function formatTargetSpec(target: Pick<Target, 'name' | 'type' | 'timeout'>): string {
  if (target.timeout !== undefined) {
    return `${target.name}:${target.type ?? ''}:${target.timeout}`;
  }
  if (target.type !== undefined) {
    return `${target.name}:${target.type}`;
  }
  return target.name;
}

/**
 * Build the target list for a run: the explicit command-line entries when
 * given, otherwise every configured target in file order.
 */
export function resolveTargets(config: RunConfig, explicit: string[]): Target[] {
  const targets =
    explicit.length > 0
      ? explicit.map((entry) => {
          const spec = parseTargetSpec(entry);
          const base = toTarget(
            spec.name,
            Object.hasOwn(config, spec.name) ? config[spec.name] : undefined,
          );
          return {
            ...base,
            type: spec.type ?? base.type,
            timeout: spec.timeout ?? base.timeout,
          };
        })
      : Object.entries(config).map(([name, params]) => toTarget(name, params));

  const seen = new Set<string>();
  for (const target of targets) {
    if (seen.has(target.name)) {
      throw new ConfigError(`Target listed more than once: ${target.name}`);
    }
    seen.add(target.name);
  }
  return targets;
}
