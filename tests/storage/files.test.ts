/**
 * Tests for file-based storage.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { basename, join } from 'path';
import { fileURLToPath } from 'url';
import {
  KIND_DIRS,
  WORKSPACE_DIR,
  findWorkspaceRoot,
  kindFromName,
  loadAllDefinitions,
  loadDefinition,
  loadWorkspace,
} from '../../src/storage/files.js';
import { runEvaluationRequest } from '../../src/storage/workspace.js';

const fixtureRoot = fileURLToPath(new URL('../fixtures/workspace', import.meta.url));
const fixtureDir = (kind: keyof typeof KIND_DIRS) => join(fixtureRoot, WORKSPACE_DIR, KIND_DIRS[kind]);

describe('findWorkspaceRoot', () => {
  it('should find the root from a nested directory', () => {
    expect(findWorkspaceRoot(join(fixtureRoot, WORKSPACE_DIR, 'models', 'nested'))).toBe(fixtureRoot);
  });

  it('should return null outside a workspace', () => {
    const dir = mkdtempSync(join(tmpdir(), 'twist-none-'));
    try {
      expect(findWorkspaceRoot(dir)).toBeNull();
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe('kindFromName', () => {
  it('should accept kind names and directory names', () => {
    expect(kindFromName('model')).toBe('model');
    expect(kindFromName('models')).toBe('model');
    expect(kindFromName('twists')).toBe('twist');
    expect(kindFromName('residuated')).toBe('residuated');
  });

  it('should not resolve built-in object property names', () => {
    expect(kindFromName('toString')).toBeUndefined();
    expect(kindFromName('constructor')).toBeUndefined();
    expect(kindFromName('__proto__')).toBeUndefined();
  });
});

describe('loadDefinition', () => {
  it('should load a residuated lattice from YAML', () => {
    const entry = loadDefinition(join(fixtureDir('residuated'), 'bool.yaml'), 'residuated');

    expect(entry.kind).toBe('residuated');
    expect(entry.definition.name).toBe('bool');
    expect(entry.definition.elements).toEqual(['0', '1']);
  });

  it('should load a model from JSON', () => {
    const entry = loadDefinition(join(fixtureDir('model'), 'nested', 'relay.json'), 'model');

    expect(entry).toMatchObject({ kind: 'model', definition: { name: 'relay', twistStructureRef: 'three' } });
  });
});

describe('loadAllDefinitions', () => {
  it('should walk directories recursively in name order and collect failures', () => {
    const result = loadAllDefinitions(fixtureDir('model'), 'model');

    expect(result.definitions.map((d) => d.entry.definition.name)).toEqual(['demo', 'relay']);
    expect(result.failures).toHaveLength(1);
    expect(basename(result.failures[0].filePath)).toBe('broken.yaml');
    expect(result.failures[0].message).toBe('Invalid model definition: twistStructureRef: Required');
  });

  it('should accept the .yml extension', () => {
    const result = loadAllDefinitions(fixtureDir('lattice'), 'lattice');
    expect(result.definitions.map((d) => d.entry.definition.name)).toEqual(['diamond']);
  });

  it('should return nothing for a missing directory', () => {
    expect(loadAllDefinitions(join(fixtureRoot, 'absent'), 'lattice')).toEqual({
      definitions: [],
      failures: [],
    });
  });
});

describe('loadWorkspace', () => {
  it('should load every kind and build models from them', () => {
    const { workspace, failures } = loadWorkspace(fixtureRoot);

    expect(workspace.names('lattice')).toEqual(['diamond']);
    expect(workspace.names('residuated')).toEqual(['bool', 'three']);
    expect(workspace.names('twist')).toEqual(['bool-twist']);
    expect(workspace.names('model')).toEqual(['demo', 'relay']);
    expect(failures.map((f) => basename(f.filePath))).toEqual(['broken.yaml']);

    expect(workspace.model('demo').description).toBe('p fails at the only successor');
    expect(workspace.residuatedLattice('three').residuum('h', '0')).toBe('h');
  });

  it('should evaluate over a three-valued model', () => {
    const { workspace } = loadWorkspace(fixtureRoot);

    expect(runEvaluationRequest({ formulaText: '<>_pass p', modelRef: 'relay' }, workspace)).toEqual({
      valid: false,
      counterExamples: [
        { world: 's1', value: ['h', 'h'] },
        { world: 's2', value: ['h', '0'] },
      ],
    });
  });

  describe('with duplicate names', () => {
    let root: string;

    beforeEach(() => {
      root = mkdtempSync(join(tmpdir(), 'twist-dup-'));
      const dir = join(root, WORKSPACE_DIR, KIND_DIRS.lattice);
      mkdirSync(dir, { recursive: true });
      writeFileSync(join(dir, 'a.yaml'), 'name: same\nelements: [x]\n');
      writeFileSync(join(dir, 'b.yaml'), 'name: same\nelements: [y]\n');
    });

    afterEach(() => {
      rmSync(root, { recursive: true, force: true });
    });

    it('should keep the first definition and report the second', () => {
      const { workspace, failures } = loadWorkspace(root);

      expect(workspace.lattice('same').top).toBe('x');
      expect(failures).toEqual([
        { filePath: join(root, WORKSPACE_DIR, 'lattices', 'b.yaml'), message: "Duplicate lattice 'same'" },
      ]);
    });
  });
});
