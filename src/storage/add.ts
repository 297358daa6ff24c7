/**
 * Write definitions into a workspace.
 */

import { writeFileSync, existsSync, mkdirSync } from 'fs';
import { join, dirname } from 'path';
import { stringify } from 'yaml';
import { WorkspaceError } from '../core/errors.js';
import {
  DEFINITION_KINDS,
  type AnyDefinition,
  type ModelDefinition,
  type ResiduatedLatticeDefinition,
  type TwistStructureDefinition,
} from '../core/types.js';
import { CONFIG_FILE } from '../config/index.js';
import { parseDefinition } from './definitions.js';
import { KIND_DIRS, WORKSPACE_DIR } from './files.js';

export interface SaveOptions {
  /** Replace an existing file of the same name. */
  force?: boolean;
}

function ensureDir(filePath: string): void {
  const dir = dirname(filePath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }
}

export function slugify(name: string): string {
  const slug = name.toLowerCase().replace(/[^a-z0-9]+/g, '-').replace(/^-+|-+$/g, '');
  return slug.substring(0, 60) || 'unnamed';
}

/**
 * Path a definition is stored at.
 */
export function definitionPath(workspaceRoot: string, entry: AnyDefinition): string {
  return join(
    workspaceRoot,
    WORKSPACE_DIR,
    KIND_DIRS[entry.kind],
    `${slugify(entry.definition.name)}.yaml`
  );
}

/**
 * Validate a definition and write it as YAML. Returns the file path.
 */
export function saveDefinition(
  workspaceRoot: string,
  entry: AnyDefinition,
  options: SaveOptions = {}
): string {
  const checked = parseDefinition(entry.kind, entry.definition);
  const filePath = definitionPath(workspaceRoot, checked);
  if (existsSync(filePath) && !options.force) {
    throw new WorkspaceError(`${filePath} already exists`);
  }

  ensureDir(filePath);
  const content = stringify(checked.definition, { lineWidth: 0 });
  writeFileSync(filePath, content, 'utf-8');

  return filePath;
}

const STARTER_ALGEBRA: ResiduatedLatticeDefinition = {
  name: 'bool',
  elements: ['0', '1'],
  order: [['0', '1']],
  tensor: [
    ['0', '0', '0'],
    ['0', '1', '0'],
    ['1', '0', '0'],
    ['1', '1', '1'],
  ],
};

const STARTER_TWIST: TwistStructureDefinition = {
  name: 'bool-twist',
  residuatedLattice: 'bool',
};

const STARTER_MODEL: ModelDefinition = {
  name: 'demo',
  twistStructureRef: 'bool-twist',
  description: 'Two worlds joined by one fully trusted transition',
  worlds: [
    { id: 'w1', valuation: { p: ['0', '1'] } },
    { id: 'w2', valuation: { p: ['1', '0'] } },
  ],
  relations: [{ from: 'w1', to: 'w2', action: 'go', weight: ['1', '0'] }],
};

/**
 * Create the workspace layout with a starter algebra, twist structure and
 * model. Returns the files written.
 */
export function initWorkspace(workspaceRoot: string, options: SaveOptions = {}): string[] {
  const base = join(workspaceRoot, WORKSPACE_DIR);
  if (existsSync(base) && !options.force) {
    throw new WorkspaceError(`${base} already exists`);
  }

  for (const kind of DEFINITION_KINDS) {
    mkdirSync(join(base, KIND_DIRS[kind]), { recursive: true });
  }

  const configPath = join(base, CONFIG_FILE);
  writeFileSync(configPath, stringify({ defaultModel: STARTER_MODEL.name }), 'utf-8');

  return [
    configPath,
    saveDefinition(workspaceRoot, { kind: 'residuated', definition: STARTER_ALGEBRA }, options),
    saveDefinition(workspaceRoot, { kind: 'twist', definition: STARTER_TWIST }, options),
    saveDefinition(workspaceRoot, { kind: 'model', definition: STARTER_MODEL }, options),
  ];
}
