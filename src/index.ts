#!/usr/bin/env node
/**
 * Policy Address Crawler
 * Command line entry point and library exports
 */

import { runCli } from './cli';

export * from './config/crawler.config';
export * from './lib/errors';
export * from './lib/chunking';
export * from './lib/dedup';
export * from './modules/indexing';
export * from './modules/policy-address';

if (require.main === module) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('❌ Crawler failed:', error);
      process.exit(1);
    });
}
