/**
 * Workspace configuration.
 *
 * An optional `.twist/config.yaml`, validated against {@link ConfigSchema}
 * and merged over the defaults. Command-line options override both.
 */

import { z } from 'zod';
import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { parse } from 'yaml';
import { WorkspaceError } from '../core/errors.js';
import { formatIssues } from '../storage/definitions.js';
import { WORKSPACE_DIR } from '../storage/files.js';

export const CONFIG_FILE = 'config.yaml';

export const ConfigSchema = z.object({
  /** Model used by `eval` and `check` when `--model` is omitted. */
  defaultModel: z.string().min(1).optional(),
  color: z.boolean().default(true),
  /** Counter-examples printed before the list is truncated. */
  maxCounterExamples: z.number().int().positive().default(20),
});

export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = ConfigSchema.parse({});

/**
 * Read the workspace config, or the defaults when there is none.
 */
export function loadConfig(workspaceRoot: string): Config {
  const filePath = join(workspaceRoot, WORKSPACE_DIR, CONFIG_FILE);
  if (!existsSync(filePath)) {
    return DEFAULT_CONFIG;
  }

  let raw: unknown;
  try {
    raw = parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new WorkspaceError(
      `Invalid ${CONFIG_FILE}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new WorkspaceError(`Invalid ${CONFIG_FILE}: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/**
 * Apply overrides, ignoring keys whose value is undefined.
 */
export function mergeConfig(base: Config, overrides: Partial<Config>): Config {
  const defined = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );
  return ConfigSchema.parse({ ...base, ...defined });
}
