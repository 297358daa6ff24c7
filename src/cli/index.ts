#!/usr/bin/env node
/**
 * twist CLI - inspect algebras and models, evaluate and check formulas.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { loadConfig, mergeConfig, type Config } from '../config/index.js';
import { TwistModalError } from '../core/errors.js';
import type { DefinitionKind } from '../core/types.js';
import { findWorkspaceRoot, kindFromName, loadWorkspace } from '../storage/files.js';
import { initWorkspace } from '../storage/add.js';
import { runEvaluationRequest, type Workspace } from '../storage/workspace.js';
import { parseFormula } from '../formula/parser.js';
import { formatFormula } from '../formula/print.js';
import { formulaActions, formulaAtoms } from '../formula/ast.js';
import { evaluate, evaluateAll } from '../semantics/evaluate.js';
import { checkValidity } from '../semantics/validity.js';
import {
  describeLattice,
  describeModel,
  describeResiduatedLattice,
  describeTwistStructure,
  formatValidity,
  formatWorldValues,
} from '../export/report.js';

interface JsonOption {
  json?: boolean;
}

interface ModelOptions extends JsonOption {
  model?: string;
}

interface EvalOptions extends ModelOptions {
  world?: string;
}

interface ShowOptions extends JsonOption {
  kind?: string;
}

const program = new Command();

program
  .name('twist')
  .description('Paraconsistent modal logic over finite twist structures')
  .version('0.1.0')
  .option('-v, --verbose', 'Print diagnostic output to stderr')
  .option('--no-color', 'Disable coloured output');

function debug(message: string): void {
  if (program.opts<{ verbose?: boolean }>().verbose) {
    console.error(chalk.gray(`[twist] ${message}`));
  }
}

function fail(message: string): never {
  console.error(chalk.red(message));
  process.exit(1);
}

/**
 * Run a command body, turning library errors into a red message and exit 1.
 */
function run(body: () => void): void {
  try {
    body();
  } catch (error) {
    if (error instanceof TwistModalError) {
      fail(`${error.name}: ${error.message}`);
    }
    throw error;
  }
}

function openWorkspace(): { workspace: Workspace; config: Config } {
  const root = findWorkspaceRoot();
  if (!root) {
    fail('Not in a twist workspace (run `twist init`)');
  }
  debug(`workspace root: ${root}`);

  const { color } = program.opts<{ color: boolean }>();
  const config = mergeConfig(loadConfig(root), { color: color ? undefined : false });
  if (!config.color) {
    chalk.level = 0;
  }

  const { workspace, failures } = loadWorkspace(root);
  for (const failure of failures) {
    console.error(chalk.yellow(`Skipped ${failure.filePath}: ${failure.message}`));
  }
  return { workspace, config };
}

function resolveModelName(options: ModelOptions, config: Config): string {
  const name = options.model ?? config.defaultModel;
  if (!name) {
    fail('No model given: pass --model or set defaultModel in .twist/config.yaml');
  }
  return name;
}

// Init command
program
  .command('init')
  .description('Initialize a new workspace in the current directory')
  .option('-f, --force', 'Overwrite existing workspace files')
  .action((options: { force?: boolean }) =>
    run(() => {
      const files = initWorkspace(process.cwd(), { force: options.force });
      for (const file of files) {
        console.log(chalk.green(`Created ${file}`));
      }
    })
  );

// List command
program
  .command('list [kind]')
  .description('List definitions (lattices, residuated, twists, models)')
  .action((kind: string | undefined) =>
    run(() => {
      const { workspace } = openWorkspace();
      const kinds: DefinitionKind[] = kind
        ? [kindFromName(kind) ?? fail(`Unknown kind: ${kind}`)]
        : ['lattice', 'residuated', 'twist', 'model'];

      for (const k of kinds) {
        for (const name of workspace.names(k)) {
          console.log(`${chalk.cyan(name)} ${chalk.gray(`(${k})`)}`);
        }
      }
    })
  );

// Show command
program
  .command('show <name>')
  .description('Show the tables of an algebra or the contents of a model')
  .option('-k, --kind <kind>', 'Definition kind when a name is ambiguous')
  .option('--json', 'Print the definition as JSON')
  .action((name: string, options: ShowOptions) =>
    run(() => {
      const { workspace } = openWorkspace();
      const order: DefinitionKind[] = ['model', 'twist', 'residuated', 'lattice'];
      const kind = options.kind
        ? kindFromName(options.kind) ?? fail(`Unknown kind: ${options.kind}`)
        : order.find((k) => workspace.has(k, name)) ?? fail(`Nothing named '${name}'`);

      if (options.json) {
        console.log(JSON.stringify(workspace.definition(kind, name), null, 2));
        return;
      }

      switch (kind) {
        case 'lattice':
          console.log(describeLattice(name, workspace.lattice(name)));
          break;
        case 'residuated':
          console.log(describeResiduatedLattice(name, workspace.residuatedLattice(name)));
          break;
        case 'twist':
          console.log(describeTwistStructure(name, workspace.twistStructure(name)));
          break;
        case 'model':
          console.log(describeModel(workspace.model(name)));
          break;
      }
    })
  );

// Parse command
program
  .command('parse <formula>')
  .description('Parse a formula and print its canonical form')
  .option('--json', 'Print the syntax tree as JSON')
  .action((text: string, options: JsonOption) =>
    run(() => {
      const formula = parseFormula(text);
      if (options.json) {
        console.log(JSON.stringify(formula, null, 2));
        return;
      }
      console.log(formatFormula(formula));
      console.log(chalk.gray(`Atoms: ${formulaAtoms(formula).join(', ') || 'none'}`));
      console.log(chalk.gray(`Actions: ${formulaActions(formula).join(', ') || 'none'}`));
    })
  );

// Eval command
program
  .command('eval <formula>')
  .description('Evaluate a formula at one world, or at every world')
  .option('-m, --model <model>', 'Model name')
  .option('-w, --world <world>', 'World id (default: all worlds)')
  .option('--json', 'Print results as JSON')
  .action((text: string, options: EvalOptions) =>
    run(() => {
      const { workspace, config } = openWorkspace();
      const formula = parseFormula(text);
      const model = workspace.model(resolveModelName(options, config));
      const ts = model.structure;
      debug(`evaluating ${formatFormula(formula)} in ${model.name}`);

      const values = options.world
        ? [{ world: options.world, value: evaluate(formula, model, options.world) }]
        : evaluateAll(formula, model);

      if (options.json) {
        console.log(
          JSON.stringify(
            values.map(({ world, value }) => ({ world, value: ts.toPair(value) })),
            null,
            2
          )
        );
        return;
      }
      console.log(formatWorldValues(values, ts));
    })
  );

// Check command
program
  .command('check <formula>')
  .description('Check whether a formula is valid in a model')
  .option('-m, --model <model>', 'Model name')
  .option('--json', 'Print the result as JSON')
  .action((text: string, options: ModelOptions) =>
    run(() => {
      const { workspace, config } = openWorkspace();
      const modelRef = resolveModelName(options, config);

      if (options.json) {
        const response = runEvaluationRequest({ formulaText: text, modelRef }, workspace);
        console.log(JSON.stringify(response, null, 2));
        if (!response.valid) process.exitCode = 1;
        return;
      }

      const formula = parseFormula(text);
      const model = workspace.model(modelRef);
      const result = checkValidity(formula, model);
      const report = formatValidity(formatFormula(formula), result, model.structure, {
        maxCounterExamples: config.maxCounterExamples,
      });
      console.log(result.valid ? chalk.green(report) : chalk.red(report));

      if (!result.valid) {
        process.exitCode = 1;
      }
    })
  );

program.parse();
