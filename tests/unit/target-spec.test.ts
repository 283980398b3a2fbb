import { describe, it, expect } from 'vitest';
import {
  formatTargetSpec,
  parseTargetSpec,
  resolveTargets,
} from '../../src/utils/target-spec.js';
import type { RunConfig } from '../../src/utils/run-config.js';

const config: RunConfig = {
  json4s: { deps: ['sbt'], options: {} },
  zlib: { type: 'autotools', timeout: 20, deps: [], options: {} },
  bash: { deps: [], options: {} },
};

describe('parseTargetSpec', () => {
  it('parses a bare name', () => {
    expect(parseTargetSpec('json4s')).toEqual({ name: 'json4s' });
  });

  it('parses type and timeout overrides', () => {
    expect(parseTargetSpec('zlib:cmake:45')).toEqual({ name: 'zlib', type: 'cmake', timeout: 45 });
    expect(parseTargetSpec('zlib::45')).toEqual({ name: 'zlib', timeout: 45 });
    expect(parseTargetSpec('zlib:cmake')).toEqual({ name: 'zlib', type: 'cmake' });
  });

  it('rejects malformed entries', () => {
    expect(() => parseTargetSpec(':cmake')).toThrow(/Invalid target/);
    expect(() => parseTargetSpec('a:b:1:extra')).toThrow(/Invalid target/);
    expect(() => parseTargetSpec('zlib:cmake:soon')).toThrow(/Invalid timeout/);
    expect(() => parseTargetSpec('zlib:cmake:0')).toThrow(/Invalid timeout/);
  });
});

describe('formatTargetSpec', () => {
  it('writes only the fields that are set', () => {
    expect(formatTargetSpec({ name: 'json4s' })).toBe('json4s');
    expect(formatTargetSpec({ name: 'zlib', type: 'cmake' })).toBe('zlib:cmake');
    expect(formatTargetSpec({ name: 'zlib', timeout: 45 })).toBe('zlib::45');
    expect(formatTargetSpec({ name: 'zlib', type: 'cmake', timeout: 45 })).toBe('zlib:cmake:45');
  });
});

describe('resolveTargets', () => {
  it('uses every configured target when none are given', () => {
    expect(resolveTargets(config, []).map((t) => t.name)).toEqual(['json4s', 'zlib', 'bash']);
  });

  it('uses only explicit targets, in the order given', () => {
    const targets = resolveTargets(config, ['bash', 'json4s']);
    expect(targets.map((t) => t.name)).toEqual(['bash', 'json4s']);
    expect(targets[1].deps).toEqual(['sbt']);
  });

  it('lets explicit entries override type and timeout', () => {
    const [zlib] = resolveTargets(config, ['zlib:cmake']);
    expect(zlib).toEqual({ name: 'zlib', type: 'cmake', timeout: 20, deps: [], options: {} });
  });

  it('accepts explicit targets missing from the configuration', () => {
    const [target] = resolveTargets(config, ['coreutils']);
    expect(target).toEqual({
      name: 'coreutils',
      type: undefined,
      timeout: undefined,
      deps: [],
      options: {},
    });
  });

  it('rejects duplicate targets', () => {
    expect(() => resolveTargets(config, ['bash', 'bash:make'])).toThrow(/more than once/);
  });
});
