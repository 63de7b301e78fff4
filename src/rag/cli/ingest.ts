#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { loadConfig, type AgentConfig } from '../../config/index.js';
import { describeError } from '../../errors.js';
import type { IngestionEvent } from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { createAgent, type DocsVoiceAgent } from '../voice-agent.js';
import { crawlerKind, nonNegativeInt, positiveInt } from './options.js';

interface IngestCliOptions {
  collection?: string;
  maxPages?: number;
  maxDepth?: number;
  crawler?: AgentConfig['crawler'];
  verbose?: boolean;
}

const PHASE_LABELS: Record<string, string> = {
  crawling: 'Crawling documentation...',
  chunking: 'Splitting pages into passages...',
  embedding: 'Embedding passages...',
  indexing: 'Writing passages to the store...',
};

const program = new Command();

program
  .name('docs-agent-ingest')
  .description('Crawl a documentation site (or a local markdown directory) and index it')
  .argument('<source>', 'Documentation root URL or local directory')
  .option('-c, --collection <name>', 'Collection id (defaults to one derived from the source)')
  .option('-p, --max-pages <number>', 'Maximum pages to crawl', positiveInt)
  .option('-d, --max-depth <number>', 'Maximum link depth from the root page', nonNegativeInt)
  .option('--crawler <type>', 'Crawler for remote sites (site|firecrawl)', crawlerKind)
  .option('-v, --verbose', 'Show debug logs')
  .action(async (source: string, options: IngestCliOptions) => {
    const spinner = ora();
    let agent: DocsVoiceAgent | undefined;

    logger.setVerbose(options.verbose === true);
    logger.setWarningsOnly(options.verbose !== true);

    try {
      console.log(chalk.bold('\n📚 Documentation Ingestion\n'));

      const config = loadConfig({
        crawlMaxPages: options.maxPages,
        crawlMaxDepth: options.maxDepth,
        crawler: options.crawler,
      });
      agent = createAgent(config);

      spinner.start(PHASE_LABELS.crawling);
      const report = await agent.ingest(source, {
        collection: options.collection,
        onEvent: (event: IngestionEvent) => {
          if (event.type === 'batch') {
            spinner.text = `Embedding passages... batch ${event.completed}/${event.total}`;
          } else if (PHASE_LABELS[event.phase]) {
            spinner.text = PHASE_LABELS[event.phase];
          }
        },
      });
      spinner.succeed(`Indexed ${chalk.cyan(report.collection)}`);

      const seconds = (Date.parse(report.finishedAt) - Date.parse(report.startedAt)) / 1000;
      console.log(chalk.bold('\n📊 Ingestion Summary\n'));
      console.log(`  Source:        ${chalk.dim(report.rootUrl)}`);
      console.log(`  Documents:     ${chalk.cyan(report.documents.toLocaleString())}`);
      console.log(`  Passages:      ${chalk.cyan(report.passages.toLocaleString())}`);
      console.log(`  Source URLs:   ${chalk.cyan(report.sources.toLocaleString())}`);
      console.log(`  Embedding:     ${report.space.model} (${report.space.dimension}d, ${report.space.metric})`);
      console.log(`  Duration:      ${chalk.cyan(seconds.toFixed(1))}s`);
      for (const [phase, ms] of Object.entries(report.timings)) {
        console.log(chalk.dim(`    ${phase.padEnd(10)} ${ms}ms`));
      }

      console.log(chalk.green(`\n✅ Ask questions with: docs-agent-ask -c ${report.collection}\n`));
    } catch (error) {
      spinner.fail(chalk.red(describeError(error)));
      process.exitCode = 1;
    } finally {
      await agent?.close();
    }
  });

await program.parseAsync();
