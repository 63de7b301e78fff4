#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import readline from 'readline';
import { loadConfig } from '../../config/index.js';
import { getAudioDir } from '../../config/paths.js';
import { describeError } from '../../errors.js';
import type { VoiceResponse, VoiceStyle } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { writeAudioFile } from '../response-packager.js';
import { collectionIdFor, createAgent, type DocsVoiceAgent } from '../voice-agent.js';
import { positiveInt, voiceStyle } from './options.js';

interface AskCliOptions {
  collection?: string;
  question?: string;
  topK?: number;
  voice?: VoiceStyle;
  audio: boolean;
  out?: string;
  verbose?: boolean;
}

interface AskSettings {
  collection: string;
  k?: number;
  voice?: VoiceStyle;
  audioDir?: string;
}

const program: Command = new Command();

program
  .name('docs-agent-ask')
  .description('Ask questions about an ingested documentation source')
  .argument('[source]', 'Documentation root URL or directory that was ingested')
  .option('-c, --collection <name>', 'Collection id (instead of a source)')
  .option('-q, --question <text>', 'Question to ask (if not provided, enters interactive mode)')
  .option('-k, --top-k <number>', 'Number of passages to retrieve', positiveInt)
  .option('--voice <style>', 'Voice style (default|female|male)', voiceStyle)
  .option('--no-audio', 'Skip speech synthesis')
  .option('-o, --out <dir>', 'Directory for audio files')
  .option('-v, --verbose', 'Show debug logs')
  .action(async (source: string | undefined, options: AskCliOptions) => {
    const spinner = ora();
    let agent: DocsVoiceAgent | undefined;

    logger.setVerbose(options.verbose === true);
    logger.setWarningsOnly(options.verbose !== true);

    try {
      const collection = options.collection ?? (source ? collectionIdFor(source) : undefined);
      if (!collection) {
        program.error('Pass the ingested source or --collection <name>');
      }

      const config = loadConfig();
      agent = createAgent(config, options.audio ? {} : { speech: undefined });

      const settings: AskSettings = {
        collection,
        k: options.topK,
        voice: options.voice,
        audioDir: options.audio ? (options.out ?? getAudioDir(config.cacheDir)) : undefined,
      };

      console.log(chalk.bold('\n🎙️  Documentation Voice Agent\n'));
      console.log(chalk.dim(`Collection: ${collection}`));

      if (options.question) {
        await askOnce(agent, options.question, settings);
        return;
      }

      // Interactive mode
      const rl = readline.createInterface({
        input: process.stdin,
        output: process.stdout,
      });

      console.log(chalk.dim('\nEnter your question (or type "quit" to exit):\n'));

      const askQuestion = () => {
        return new Promise<string>(resolve => {
          rl.question(chalk.cyan('Question: '), answer => {
            resolve(answer.trim());
          });
        });
      };

      for (;;) {
        const question = await askQuestion();

        if (question.toLowerCase() === 'quit' || question.toLowerCase() === 'exit') {
          console.log(chalk.green('\nGoodbye! 👋'));
          break;
        }

        if (!question) {
          continue;
        }

        try {
          await askOnce(agent, question, settings);
        } catch (error) {
          console.error(chalk.red(describeError(error)));
        }
      }

      rl.close();
    } catch (error) {
      spinner.fail(chalk.red(describeError(error)));
      process.exitCode = 1;
    } finally {
      await agent?.close();
    }
  });

async function askOnce(agent: DocsVoiceAgent, question: string, settings: AskSettings): Promise<void> {
  const spinner = ora('Thinking...').start();
  const startTime = Date.now();

  let response: VoiceResponse;
  try {
    response = await agent.ask(settings.collection, question, { k: settings.k, voice: settings.voice });
  } finally {
    spinner.stop();
  }

  console.log(chalk.bold(`\n${response.text}\n`));

  if (response.sources.length > 0) {
    console.log(chalk.bold('Sources:'));
    response.sources.forEach((url, index) => {
      console.log(`  ${index + 1}. ${chalk.dim(url)}`);
    });
  }
  if (!response.grounded) {
    console.log(chalk.yellow('No indexed passage was relevant enough to ground this answer.'));
  }

  if (settings.audioDir) {
    if (response.audio.status === 'available') {
      const filePath = await writeAudioFile(response, settings.audioDir);
      console.log(`🔊 Audio: ${chalk.cyan(filePath ?? '')}`);
    } else {
      console.log(chalk.yellow(`🔇 Audio unavailable: ${response.audio.reason}`));
    }
  }

  console.log(chalk.dim(`\n(${Date.now() - startTime}ms)\n`));
}

await program.parseAsync();
