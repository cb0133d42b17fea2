#!/usr/bin/env node
/**
 * Command line interface for generating games and game rules.
 */

import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { readFile, writeFile } from 'fs/promises';
import { loadConfig } from './config.js';
import { createGenerationServices } from './services.js';
import { CompletionRouter } from './ai/codegen/generation-graph.js';
import { GenerationOrchestrator } from './ai/codegen/orchestrator.js';
import { generateRules } from './ai/codegen/rules-generator.js';
import { describeOutcome } from './ai/codegen/types.js';

export interface CliServices {
  orchestrator: Pick<GenerationOrchestrator, 'run'>;
  router: CompletionRouter;
}

export type ServicesLoader = (overrides: { retryBudget?: number }) => CliServices;

const defaultLoader: ServicesLoader = ({ retryBudget }) => {
  const env = retryBudget === undefined ? process.env : { ...process.env, GAMESYNTH_RETRY_BUDGET: String(retryBudget) };
  return createGenerationServices(loadConfig(env));
};

function parseBudget(value: string): number {
  const budget = Number(value);
  if (!Number.isInteger(budget) || budget < 1) {
    throw new InvalidArgumentError('Budget must be a positive integer.');
  }
  return budget;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

// Ctrl+C cancels the session instead of killing the process mid-write
export async function withInterrupt<T>(work: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = () => {
    console.error(chalk.yellow('Interrupted, cancelling...'));
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);
  try {
    return await work(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

export function createProgram(loadServices: ServicesLoader = defaultLoader): Command {
  const program = new Command();

  program
    .name('game-synth')
    .description('Generate runnable terminal games from natural-language rules')
    .version('0.1.0');

  /**
   * Command to generate a game program from a rules file
   */
  program
    .command('generate')
    .description('Generate and validate a game program from a rules file')
    .requiredOption('-r, --rules <file>', 'file containing the rules prompt')
    .option('-o, --out <file>', 'where to write the program', 'game.js')
    .option('-b, --budget <n>', 'maximum number of attempts', parseBudget)
    .action(async (options: { rules: string; out: string; budget?: number }) => {
      try {
        const rulesPrompt = (await readFile(options.rules, 'utf-8')).trim();
        if (rulesPrompt === '') {
          console.error(chalk.red(`Rules file ${options.rules} is empty.`));
          process.exitCode = 1;
          return;
        }

        const { orchestrator } = loadServices({ retryBudget: options.budget });
        console.log(chalk.blue('Generating game program...'));
        const result = await withInterrupt((signal) => orchestrator.run(rulesPrompt, { signal }));

        if (result.status === 'success') {
          await writeFile(options.out, `${result.artifact}\n`, 'utf-8');
          console.log(
            chalk.green(
              `Program written to ${options.out} (provider: ${result.providerUsed}, attempts: ${result.attemptNumber})`
            )
          );
          return;
        }

        console.error(chalk.red(`Generation failed after ${result.attempts.length} attempts:`));
        result.outcomes.forEach((outcome, index) => {
          console.error(chalk.yellow(`  ${index + 1}. ${describeOutcome(outcome)}`));
        });
        process.exitCode = 1;
      } catch (error) {
        console.error(chalk.red(`Error generating game: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  /**
   * Command to invent rules for a new game
   */
  program
    .command('rules <gameName>')
    .description('Generate rules for a new game')
    .option('-o, --out <file>', 'write the rules to a file instead of stdout')
    .action(async (gameName: string, options: { out?: string }) => {
      try {
        const { router } = loadServices({});
        const generated = await withInterrupt((signal) => generateRules(router, gameName, { signal }));

        if (options.out) {
          await writeFile(options.out, `${generated.rules}\n`, 'utf-8');
          console.log(chalk.green(`Rules written to ${options.out} (provider: ${generated.providerUsed})`));
        } else {
          console.log(generated.rules);
        }
      } catch (error) {
        console.error(chalk.red(`Error generating rules: ${errorMessage(error)}`));
        process.exitCode = 1;
      }
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      console.error(chalk.red(errorMessage(error)));
      process.exitCode = 1;
    });
}
