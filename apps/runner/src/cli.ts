#!/usr/bin/env node
/**
 * Lingo Shorts CLI
 *
 * Command-line interface for the video and post pipelines.
 */

import 'dotenv/config';
import { Argument, Command, InvalidArgumentError, Option } from 'commander';
import { ConfigError, errorMessage, logger } from '@lingo-shorts/core';

function parseInteger(min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`Expected an integer of at least ${min}.`);
    }
    return parsed;
  };
}

/**
 * Run a command body. A ConfigError prints its diagnostic; anything else is
 * logged. Both end the process with exit code 1.
 */
async function run(task: () => Promise<unknown>): Promise<void> {
  try {
    await task();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`\n❌ ${error.message}\n`);
    } else {
      logger.error(`[CLI] ${errorMessage(error)}`);
    }
    process.exitCode = 1;
  }
}

const providerOption = () =>
  new Option('--provider <name>', 'Text generation provider').choices(['gemini', 'openai']);

const program = new Command();

program
  .name('lingo-shorts')
  .description('Lingo Shorts - English-learning shorts and X posts')
  .version('0.1.0');

// Video command
program
  .command('video')
  .description('Generate new shadowing scripts and render a short for each')
  .addOption(providerOption())
  .option('-n, --batch-size <number>', 'Scripts to request this run', parseInteger(1))
  .option('-p, --port <number>', 'Port for the local audio server', parseInteger(0))
  .option('-w, --work-dir <dir>', 'Directory holding history, audio and videos')
  .action(async (options: { provider?: string; batchSize?: number; port?: number; workDir?: string }) => {
    await run(async () => {
      // Import dynamically to avoid loading every SDK for help
      const { makeVideos } = await import('./commands/video.js');
      await makeVideos(options);
    });
  });

// Post command
program
  .command('post')
  .description('Generate one English tip and post it to X')
  .addOption(new Option('--variant <variant>', 'Post format').choices(['json', 'template']))
  .option('--dry-run', 'Generate and print without posting or recording')
  .addOption(providerOption())
  .option('-w, --work-dir <dir>', 'Directory holding the post history')
  .action(async (options: { variant?: string; dryRun?: boolean; provider?: string; workDir?: string }) => {
    await run(async () => {
      const { publishPost } = await import('./commands/post.js');
      await publishPost(options);
    });
  });

// History command
program
  .command('history')
  .description('List recorded scripts or posts, oldest first')
  .addArgument(new Argument('<kind>', 'Which history to show').choices(['video', 'post']))
  .option('-l, --limit <number>', 'Only show the most recent entries', parseInteger(1))
  .option('-w, --work-dir <dir>', 'Directory holding the history files')
  .action(async (kind: string, options: { limit?: number; workDir?: string }) => {
    await run(async () => {
      const { showHistory } = await import('./commands/history.js');
      await showHistory(kind, options);
    });
  });

// Config command
program
  .command('config')
  .description('Show the effective configuration')
  .action(async () => {
    await run(async () => {
      const { showConfig } = await import('./commands/config.js');
      await showConfig();
    });
  });

await program.parseAsync(process.argv);
