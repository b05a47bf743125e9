#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { Generator, GeneratorOptions } from './core/Generator';
import { DEFAULT_CONFIG_PATH } from './config/loadConfig';
import { createSeededRandom } from './utils/random';
import { isTrait } from './types/traits';
import logger from './utils/logger';

const program = new Command();

const parseCount = (value: string): number => {
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`Invalid count: ${value}`);
  }
  return parsed;
};

const seedOption = (seed?: string): GeneratorOptions =>
  seed === undefined ? {} : { random: createSeededRandom(/^\d+$/.test(seed) ? parseInt(seed, 10) : seed) };

const fail = (error: unknown): never => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
  process.exit(1);
};

program
  .name('tokengen')
  .description('Layered token collection generator with weighted trait selection')
  .version('1.0.0');

program
  .command('generate')
  .description('Generate the token collection')
  .option('-c, --config <path>', 'Config file path', DEFAULT_CONFIG_PATH)
  .option('--amount <number>', 'Number of tokens to generate (overrides config)')
  .option('--seed <seed>', 'Seed for reproducible generation (overrides config)')
  .option('--clean', 'Empty the output directory first')
  .action(async (options: { config: string; amount?: string; seed?: string; clean?: boolean }) => {
    const spinner = ora('Initializing generator...').start();

    try {
      const generator = await Generator.fromFile(options.config, seedOption(options.seed));

      spinner.text = 'Generating tokens...';
      const result = await generator.generate({
        clean: options.clean,
        amountOverride: options.amount ? parseCount(options.amount) : undefined
      });

      spinner.succeed(`Generated ${result.records.length} tokens (${result.duplicates} duplicate draws)`);
      result.notices.forEach(notice => console.log(chalk.yellow(notice)));
      console.log(chalk.blue(`Images: ${generator.buildPaths.imagesDir}`));
      console.log(chalk.blue(`Metadata: ${generator.buildPaths.jsonDir}`));
    } catch (error) {
      spinner.fail('Generation failed');
      fail(error);
    }
  });

program
  .command('validate-layers')
  .description('Validate layer assets and rarities')
  .option('-c, --config <path>', 'Config file path', DEFAULT_CONFIG_PATH)
  .action(async (options: { config: string }) => {
    const spinner = ora('Validating layer structure...').start();

    try {
      const generator = await Generator.fromFile(options.config);
      const result = await generator.validate();

      if (result.isValid) {
        spinner.succeed('Layer validation passed');
        console.log(chalk.green(`✓ ${result.stats.totalTraits} traits found`));
        console.log(chalk.green(`✓ ${result.stats.traitTypes.length} layers found`));
        console.log(chalk.green(`✓ ${result.stats.combinationSpace} unique combinations possible`));

        if (result.warnings.length > 0) {
          console.log(chalk.yellow('\nWarnings:'));
          result.warnings.forEach(warning => console.log(chalk.yellow(`  ⚠ ${warning}`)));
        }
      } else {
        spinner.fail('Layer validation failed');
        console.log(chalk.red('\nErrors:'));
        result.errors.forEach(error => console.log(chalk.red(`  ✗ ${error}`)));
        process.exit(1);
      }
    } catch (error) {
      spinner.fail('Layer validation failed');
      fail(error);
    }
  });

program
  .command('preview-traits')
  .description('Preview unique trait combinations without writing files')
  .option('-c, --config <path>', 'Config file path', DEFAULT_CONFIG_PATH)
  .option('--count <number>', 'Number of combinations to preview', '10')
  .option('--seed <seed>', 'Seed for reproducible previews')
  .action(async (options: { config: string; count: string; seed?: string }) => {
    const spinner = ora('Generating trait preview...').start();

    try {
      const generator = await Generator.fromFile(options.config, seedOption(options.seed));
      const combinations = await generator.previewTraits(parseCount(options.count));

      spinner.succeed('Trait preview generated');
      combinations.forEach((combination, index) => {
        console.log(chalk.cyan(`\n${index + 1}.`));
        combination.forEach(candidate => {
          const label = isTrait(candidate)
            ? [candidate.group, candidate.name].filter(Boolean).join('/')
            : 'None';
          console.log(chalk.gray(`   ${candidate.type}: ${label}`));
        });
      });
    } catch (error) {
      spinner.fail('Trait preview failed');
      fail(error);
    }
  });

program
  .command('calculate-rarity')
  .description('Add trait rarity percentages to generated metadata')
  .option('-c, --config <path>', 'Config file path', DEFAULT_CONFIG_PATH)
  .action(async (options: { config: string }) => {
    const spinner = ora('Calculating rarities...').start();

    try {
      const generator = await Generator.fromFile(options.config);
      const report = await generator.calculateRarities();
      spinner.succeed('Rarity calculation completed');

      for (const [traitType, list] of Object.entries(report.traits)) {
        const rarest = list.slice(0, Math.min(3, list.length));
        console.log(`\n${traitType}:`);
        console.log(`  Rarest: ${rarest.map(item => `${item.value} (${item.percent}%)`).join(', ')}`);
      }
    } catch (error) {
      spinner.fail('Rarity calculation failed');
      fail(error);
    }
  });

program
  .command('rank-rarity')
  .description('Rank tokens by harmonic-mean trait rarity')
  .option('-c, --config <path>', 'Config file path', DEFAULT_CONFIG_PATH)
  .action(async (options: { config: string }) => {
    const spinner = ora('Ranking tokens...').start();

    try {
      const generator = await Generator.fromFile(options.config);
      const ranked = await generator.rankRarities();
      spinner.succeed(`Ranked ${ranked.length} tokens`);
    } catch (error) {
      spinner.fail('Rarity ranking failed');
      fail(error);
    }
  });

program
  .command('clean-output')
  .description('Clean output directory')
  .option('-c, --config <path>', 'Config file path', DEFAULT_CONFIG_PATH)
  .action(async (options: { config: string }) => {
    const spinner = ora('Cleaning output directory...').start();

    try {
      const generator = await Generator.fromFile(options.config);
      await generator.cleanOutput();
      spinner.succeed('Output directory cleaned');
    } catch (error) {
      spinner.fail('Cleanup failed');
      fail(error);
    }
  });

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', { reason });
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception', { error: error.message, stack: error.stack });
  process.exit(1);
});

program.parseAsync().catch(fail);
