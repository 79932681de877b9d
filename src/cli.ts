/**
 * Command Line Interface
 * crawl (default), index and validate commands over the crawl service
 */

import { env } from './config/env';
import { ConfigOverrides, CrawlerConfig, envOverrides, loadCrawlerConfig } from './config/crawler.config';
import { ConfigurationError, StorageError } from './lib/errors';
import { CrawlEngine, crawlService } from './modules/policy-address';

export type Command = 'crawl' | 'index' | 'validate';

const COMMANDS: Command[] = ['crawl', 'index', 'validate'];

export interface CliArguments {
  command: Command;
  configPath?: string;
  maxPages?: number;
  fresh: boolean;
  help: boolean;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse process.argv (without node and script); throws ConfigurationError on bad input
 */
export function parseArgs(argv: string[]): CliArguments {
  const args: CliArguments = { command: 'crawl', fresh: false, help: false };
  let commandSeen = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--help':
      case '-h':
        args.help = true;
        break;
      case '--fresh':
        args.fresh = true;
        break;
      case '--config': {
        const value = argv[++i];
        if (value === undefined || value.startsWith('--')) {
          throw new ConfigurationError('--config needs a file path');
        }
        args.configPath = value;
        break;
      }
      case '--max-pages': {
        const value = argv[++i];
        const maxPages = value === undefined ? NaN : Number(value);
        if (!Number.isInteger(maxPages) || maxPages < 1) {
          throw new ConfigurationError('--max-pages needs a positive integer');
        }
        args.maxPages = maxPages;
        break;
      }
      default:
        if (arg.startsWith('-')) {
          throw new ConfigurationError(`Unknown option: ${arg}`);
        }
        if (commandSeen || !isCommand(arg)) {
          throw new ConfigurationError(`Unknown command: ${arg}`);
        }
        args.command = arg;
        commandSeen = true;
    }
  }

  return args;
}

export function printHelp(): void {
  console.log(`Usage: policy-address-crawler [command] [options]

Commands:
  crawl       Crawl the configured years and write document records (default)
  index       Re-chunk the existing output with the current rag settings
  validate    Check the configuration file and print a summary

Options:
  --config <path>    Configuration file (default: ${env.CRAWLER_CONFIG})
  --max-pages <n>    Override max_pages
  --fresh            Ignore resume state and output from earlier runs
  -h, --help         Show this help`);
}

function printConfig(config: CrawlerConfig, source: string): void {
  console.log(`✅ Configuration ${source} is valid`);
  console.log(`   Seeds: ${config.seeds.join(', ')}`);
  console.log(`   Hosts: ${config.allowedHosts.join(', ')}`);
  console.log(`   Years: ${config.years.length > 0 ? config.years.join(', ') : 'all'}`);
  console.log(`   Languages: ${config.languages.length > 0 ? config.languages.join(', ') : 'all'}`);
  console.log(
    `   Limits: depth ${config.depthLimit}, ${config.maxPages} pages, ` +
      `${config.rateLimits.perHostRps} req/s per host, ${config.rateLimits.globalConcurrency} workers`
  );
  console.log(`   Output: ${config.storage.outputJsonl}`);
}

/**
 * Crawl with SIGINT/SIGTERM wired to a graceful stop; a second signal exits
 */
async function crawl(config: CrawlerConfig, fresh: boolean): Promise<void> {
  let engine: CrawlEngine | null = null;
  let signals = 0;

  const onSignal = (signal: NodeJS.Signals): void => {
    signals++;
    if (signals > 1) {
      console.error(`❌ ${signal} received again, exiting without saving`);
      process.exit(130);
    }
    console.log(`🛑 ${signal} received, stopping (repeat to exit immediately)`);
    engine?.stop();
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  try {
    await crawlService.runCrawl(config, {
      fresh,
      onEngine: (created) => {
        engine = created;
      },
    });
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

/**
 * Run one command; resolves to the process exit code
 */
export async function runCli(argv: string[]): Promise<number> {
  let args: CliArguments;
  try {
    args = parseArgs(argv);
  } catch (error: unknown) {
    if (error instanceof ConfigurationError) {
      console.error(`❌ ${error.message}`);
      printHelp();
      return 1;
    }
    throw error;
  }

  if (args.help) {
    printHelp();
    return 0;
  }

  const configPath = args.configPath ?? env.CRAWLER_CONFIG;
  const overrides: ConfigOverrides = {
    ...envOverrides(),
    ...(args.maxPages !== undefined ? { maxPages: args.maxPages } : {}),
  };

  try {
    const config = await loadCrawlerConfig(configPath, overrides);
    switch (args.command) {
      case 'validate':
        printConfig(config, configPath);
        break;
      case 'index':
        await crawlService.reindex(config);
        break;
      case 'crawl':
        await crawl(config, args.fresh);
        break;
    }
    return 0;
  } catch (error: unknown) {
    if (error instanceof ConfigurationError || error instanceof StorageError) {
      console.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }
}
