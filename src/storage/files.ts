/**
 * File-based storage for workspace definitions.
 */

import { readFileSync, existsSync, readdirSync } from 'fs';
import { join, dirname } from 'path';
import { parse } from 'yaml';
import { DEFINITION_KINDS, type AnyDefinition, type DefinitionKind } from '../core/types.js';
import { parseDefinition } from './definitions.js';
import { Workspace } from './workspace.js';

/**
 * Default workspace directory name.
 */
export const WORKSPACE_DIR = '.twist';

/**
 * Subdirectory of {@link WORKSPACE_DIR} holding each kind of definition.
 */
export const KIND_DIRS: Readonly<Record<DefinitionKind, string>> = {
  lattice: 'lattices',
  residuated: 'residuated',
  twist: 'twists',
  model: 'models',
};

const KIND_NAMES: ReadonlyMap<string, DefinitionKind> = new Map(
  DEFINITION_KINDS.flatMap((kind): Array<[string, DefinitionKind]> => [
    [kind, kind],
    [KIND_DIRS[kind], kind],
  ])
);

/**
 * Resolve a kind given by its own name or its directory name (`models`).
 */
export function kindFromName(name: string): DefinitionKind | undefined {
  return KIND_NAMES.get(name);
}

/**
 * A file that could not be read as a definition.
 */
export interface LoadFailure {
  filePath: string;
  message: string;
}

export interface LoadedDefinition {
  filePath: string;
  entry: AnyDefinition;
}

export interface LoadResult {
  definitions: LoadedDefinition[];
  failures: LoadFailure[];
}

/**
 * Find the workspace root directory by walking up from cwd.
 */
export function findWorkspaceRoot(startDir: string = process.cwd()): string | null {
  let dir = startDir;
  while (dir !== dirname(dir)) {
    if (existsSync(join(dir, WORKSPACE_DIR))) {
      return dir;
    }
    dir = dirname(dir);
  }
  return null;
}

function isDefinitionFile(name: string): boolean {
  return name.endsWith('.yaml') || name.endsWith('.yml') || name.endsWith('.json');
}

/**
 * Load and validate a single definition from a YAML (or JSON) file.
 */
export function loadDefinition(filePath: string, kind: DefinitionKind): AnyDefinition {
  const content = readFileSync(filePath, 'utf-8');
  return parseDefinition(kind, parse(content));
}

/**
 * Load all definitions of one kind from a directory, recursively.
 */
export function loadAllDefinitions(dir: string, kind: DefinitionKind): LoadResult {
  const result: LoadResult = { definitions: [], failures: [] };

  function walkDir(currentDir: string) {
    const entries = readdirSync(currentDir, { withFileTypes: true });
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      const fullPath = join(currentDir, entry.name);
      if (entry.isDirectory()) {
        walkDir(fullPath);
      } else if (isDefinitionFile(entry.name)) {
        try {
          result.definitions.push({ filePath: fullPath, entry: loadDefinition(fullPath, kind) });
        } catch (error) {
          result.failures.push({
            filePath: fullPath,
            message: error instanceof Error ? error.message : String(error),
          });
        }
      }
    }
  }

  if (existsSync(dir)) {
    walkDir(dir);
  }

  return result;
}

/**
 * Load every definition under a workspace root into a {@link Workspace}.
 * Unreadable files are returned as failures; duplicate names are failures too.
 */
export function loadWorkspace(workspaceRoot: string): { workspace: Workspace; failures: LoadFailure[] } {
  const workspace = new Workspace();
  const failures: LoadFailure[] = [];

  for (const kind of DEFINITION_KINDS) {
    const dir = join(workspaceRoot, WORKSPACE_DIR, KIND_DIRS[kind]);
    const loaded = loadAllDefinitions(dir, kind);
    failures.push(...loaded.failures);
    for (const { filePath, entry } of loaded.definitions) {
      if (workspace.has(entry.kind, entry.definition.name)) {
        failures.push({ filePath, message: `Duplicate ${entry.kind} '${entry.definition.name}'` });
        continue;
      }
      workspace.add(entry);
    }
  }

  return { workspace, failures };
}
