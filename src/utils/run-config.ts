import * as fs from 'fs';
import { z } from 'zod';
import type { Target } from '../types.js';

export const TargetParamsSchema = z
  .object({
    type: z.string().min(1).optional(),
    timeout: z.number().int().positive().optional(),
    deps: z.array(z.string().min(1)).default([]),
    options: z.record(z.string(), z.string()).default({}),
  })
  .strict();

export const RunConfigSchema = z.record(z.string().min(1), TargetParamsSchema);

export type TargetParams = z.infer<typeof TargetParamsSchema>;
export type RunConfig = z.infer<typeof RunConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${where}: ${issue.message}`;
    })
    .join('; ');
}

export function parseRunConfig(content: string, source = 'run configuration'): RunConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (e) {
    throw new ConfigError(
      `Invalid JSON in ${source}: ${e instanceof Error ? e.message : String(e)}`,
    );
  }

  const result = RunConfigSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

export function loadRunConfig(filePath: string): RunConfig {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Run configuration does not exist: ${filePath}`);
  }
  return parseRunConfig(fs.readFileSync(filePath, 'utf-8'), filePath);
}

export function toTarget(name: string, params: TargetParams | undefined): Target {
  return {
    name,
    type: params?.type,
    timeout: params?.timeout,
    deps: params?.deps ?? [],
    options: params?.options ?? {},
  };
}
