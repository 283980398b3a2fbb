import { z } from 'zod';
import noParallelTable from '../policies/no-parallel.json' with { type: 'json' };
import failingTestsTable from '../policies/failing-tests.json' with { type: 'json' };

const PolicyTableSchema = z.record(z.string(), z.string().min(1));

export type PolicyTable = z.infer<typeof PolicyTableSchema>;

export interface SkipPolicies {
  noParallel: PolicyTable;
  failingTests: PolicyTable;
}

export interface SkipContext {
  jobs?: string;
  enableTests?: boolean;
}

export function loadSkipPolicies(): SkipPolicies {
  return {
    noParallel: PolicyTableSchema.parse(noParallelTable),
    failingTests: PolicyTableSchema.parse(failingTestsTable),
  };
}

/**
 * Decide whether a target must be skipped before any container is made.
 * @returns The reason to skip, or null to run the target
 */
export function skipReason(
  policies: SkipPolicies,
  target: string,
  context: SkipContext,
): string | null {
  if (context.jobs !== '1' && Object.hasOwn(policies.noParallel, target)) {
    return `no parallel builds: ${policies.noParallel[target]}`;
  }
  if (context.enableTests && Object.hasOwn(policies.failingTests, target)) {
    return `failing tests: ${policies.failingTests[target]}`;
  }
  return null;
}
