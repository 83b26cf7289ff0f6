#!/usr/bin/env node
import { createRequire } from 'node:module';
import { Command, InvalidArgumentError } from 'commander';
import { config as loadEnv } from 'dotenv';

import { DEFAULT_CHAT_MODEL, loadProviderConfig } from './config.js';
import { createInputError } from './errors.js';
import { configureLogger } from './logger.js';
import { createDefaultSessionDependencies } from './providers/openaiCompatible.js';
import { Session } from './session.js';
import type { CrawlMode, CrawlOptions, Credentials } from './types.js';
import { reportCrawlerError } from './util/errorHandler.js';
import {
  logError,
  setOutputConfig,
  writeAnswer,
  writeExtraction,
  writeFailure,
  writePage,
  writeStage,
  writeSummary,
} from './util/output.js';

const require = createRequire(import.meta.url);
// eslint-disable-next-line @typescript-eslint/no-var-requires -- package.json access for CLI metadata
const pkg = require('../package.json') as { version?: string };

loadEnv();

interface CommonOptions {
  deep?: boolean;
  llm?: boolean;
  apiKey?: string;
  concurrency?: number;
  timeoutMs?: number;
  maxPages?: number;
  quiet?: boolean;
  logLevel?: string;
}

interface AskOptions extends CommonOptions {
  model: string;
}

const program = new Command();

program
  .name('site-rag')
  .description('Crawl a website and ask questions about its content.')
  .version(pkg.version ?? '0.0.0');

addCommonOptions(
  program
    .command('crawl')
    .description('Crawl a site and print a summary of what was collected.')
    .argument('<url>', 'URL to crawl.'),
).action(async (url: string, options: CommonOptions) => {
  try {
    const session = createSession(options);
    const outcome = await session.startCrawl(url, resolveMode(options), credentialsFor(options));
    writeExtraction(outcome);
    writeSummary('Crawl Summary', session.crawlSummary());
    writeSummary('Token Usage', session.usageSummary());
  } catch (error) {
    reportCliError(error);
  }
});

addCommonOptions(
  program
    .command('ask')
    .description('Crawl a site, index it and answer a question from its content.')
    .argument('<url>', 'URL to crawl.')
    .argument('<question...>', 'Question to answer.'),
)
  .option('--model <name>', 'Chat model used to answer.', DEFAULT_CHAT_MODEL)
  .action(async (url: string, question: string[], options: AskOptions) => {
    try {
      const session = createSession(options);
      const credentials = credentialsFor(options);
      await session.startCrawl(url, resolveMode(options), credentials);
      writeSummary('Crawl Summary', session.crawlSummary());

      if (!credentials) {
        throw createInputError('An API key is required to prepare the chat (--api-key or GROQ_API_KEY).');
      }
      await session.prepareSession(credentials, options.model);
      writeAnswer(await session.ask(question.join(' ')));
    } catch (error) {
      reportCliError(error);
    }
  });

await program.parseAsync(process.argv);

function addCommonOptions(command: Command): Command {
  return command
    .option('--deep', 'Crawl the sitemap, or discover pages through links when there is none.')
    .option('--llm', 'Extract the page with a language model instead of converting it to markdown.')
    .option('--api-key <key>', 'API key for the language model (defaults to GROQ_API_KEY).')
    .option('--concurrency <number>', 'Maximum number of concurrent page fetches. (default: 8)', positiveInteger)
    .option('--timeout-ms <number>', 'Timeout per page fetch in milliseconds. (default: 30000)', positiveInteger)
    .option('--max-pages <number>', 'Cap on pages found through link discovery. (default: 100)', positiveInteger)
    .option('--quiet', 'Only print summaries.')
    .option('--log-level <level>', 'Log verbosity on stderr (pino levels: trace|debug|info|warn|error|fatal).');
}

function createSession(options: CommonOptions): Session {
  configureLogger({ level: options.logLevel ?? 'silent' });
  setOutputConfig({ quiet: options.quiet === true });

  return new Session({
    ...createDefaultSessionDependencies(loadProviderConfig()),
    crawlOptions: buildCrawlOptions(options),
    handlers: {
      onStage: writeStage,
      onPage: writePage,
      onFailure: writeFailure,
    },
  });
}

function resolveMode(options: CommonOptions): CrawlMode {
  if (options.llm) {
    return 'llm';
  }
  return options.deep ? 'markdown-deep' : 'markdown-base';
}

function credentialsFor(options: CommonOptions): Credentials | undefined {
  const apiKey = options.apiKey ?? loadProviderConfig().llmApiKey;
  return apiKey ? { apiKey } : undefined;
}

function buildCrawlOptions(options: CommonOptions): Partial<CrawlOptions> {
  const crawlOptions: Partial<CrawlOptions> = {};
  if (options.concurrency !== undefined) {
    crawlOptions.concurrency = options.concurrency;
  }
  if (options.timeoutMs !== undefined) {
    crawlOptions.timeoutMs = options.timeoutMs;
  }
  if (options.maxPages !== undefined) {
    crawlOptions.maxDiscoveredUrls = options.maxPages;
  }
  return crawlOptions;
}

function positiveInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function reportCliError(error: unknown): void {
  const crawlerError = reportCrawlerError(error, { stage: 'cli' }, {
    defaultKind: 'internal',
    defaultSeverity: 'fatal',
    throwOnFatal: false,
  });
  logError(`Error: ${crawlerError.message}`);
  process.exitCode = 1;
}
