/**
 * Command-line interface
 *
 * `serve` (the default) runs the MCP server on stdio. `roll` and
 * `validate` use the same engine directly from a terminal.
 */

import { Command } from 'commander';
import chalk, { type ChalkInstance } from 'chalk';
import { loadConfig, type Config } from './config.js';
import { MCPServer, SERVER_NAME, SERVER_VERSION, createEngine } from './server.js';
import { toBreakdownDie } from './dice/breakdown.js';
import { isDiceError, type DiceError } from './dice/errors.js';

// =============================================================================
// Types
// =============================================================================

export interface CliDependencies {
  /** Writes a line of normal output */
  out: (line: string) => void;
  /** Writes a line of error output */
  err: (line: string) => void;
  setExitCode: (code: number) => void;
  chalk: ChalkInstance;
  loadConfig: () => Config;
  serve: (config: Config) => Promise<void>;
}

interface RollCommandOptions {
  allowComments?: boolean;
  detailed?: boolean;
  seed?: string;
}

interface ValidateCommandOptions {
  allowComments?: boolean;
}

// =============================================================================
// Defaults
// =============================================================================

async function serveStdio(config: Config): Promise<void> {
  const server = new MCPServer({ config });
  await server.start();
}

export const defaultCliDependencies: CliDependencies = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
  setExitCode: (code) => {
    process.exitCode = code;
  },
  chalk,
  loadConfig: () => loadConfig(),
  serve: serveStdio,
};

// =============================================================================
// Program
// =============================================================================

function reportDiceError(deps: CliDependencies, error: unknown): void {
  if (!isDiceError(error)) {
    throw error;
  }
  deps.err(deps.chalk.red(`${error.kind}: ${error.message}`));
  deps.setExitCode(1);
}

function withSeed(config: Config, seed: string | undefined): Config {
  return seed === undefined ? config : { ...config, seed };
}

export function createProgram(deps: CliDependencies = defaultCliDependencies): Command {
  const program = new Command();
  const { chalk: c } = deps;

  program
    .name('dice-mcp')
    .description('Dice notation rolling for MCP clients')
    .version(SERVER_VERSION);

  program
    .command('serve', { isDefault: true })
    .description(`Run ${SERVER_NAME} over stdio`)
    .action(async () => {
      await deps.serve(deps.loadConfig());
    });

  program
    .command('roll <expression>')
    .description('Roll a dice expression, e.g. "4d6kh3" or "1d20+5"')
    .option('-c, --allow-comments', 'accept [annotations] and a trailing comment')
    .option('-d, --detailed', 'print the evaluated tree and every die as JSON')
    .option('-s, --seed <seed>', 'seed the random source for a reproducible roll')
    .action((expression: string, options: RollCommandOptions) => {
      const engine = createEngine(withSeed(deps.loadConfig(), options.seed));

      try {
        const result = engine.roll(expression, { allowComments: options.allowComments === true });

        if (options.detailed) {
          const payload: Record<string, unknown> = {
            total: result.total,
            result: result.rendered,
            ast: engine.breakdown(result.root),
            dice: result.dice.map(toBreakdownDie),
          };
          if (result.comment !== undefined) {
            payload['comment'] = result.comment;
          }
          deps.out(JSON.stringify(payload, null, 2));
          return;
        }

        deps.out(result.rendered);
        if (result.comment !== undefined) {
          deps.out(c.gray(`# ${result.comment}`));
        }
      } catch (error) {
        reportDiceError(deps, error);
      }
    });

  program
    .command('validate <expression>')
    .description('Check a dice expression without rolling')
    .option('-c, --allow-comments', 'accept [annotations] and a trailing comment')
    .action((expression: string, options: ValidateCommandOptions) => {
      const engine = createEngine(deps.loadConfig());

      try {
        engine.validate(expression, { allowComments: options.allowComments === true });
        deps.out(c.green(`valid: ${expression}`));
      } catch (error) {
        reportDiceError(deps, error);
        if (isDiceError(error) && error.position !== undefined) {
          deps.err(pointAt(expression, error));
        }
      }
    });

  return program;
}

/**
 * Two lines: the expression and a caret under the failing position.
 */
export function pointAt(expression: string, error: DiceError): string {
  const position = Math.min(error.position ?? 0, expression.length);
  return `  ${expression}\n  ${' '.repeat(position)}^`;
}
