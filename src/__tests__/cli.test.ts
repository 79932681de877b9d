/**
 * CLI Tests
 */

import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { parseArgs, runCli } from '../cli';
import { ConfigurationError } from '../lib/errors';
import { DocumentStore, toDocumentRecord } from '../modules/indexing';
import { CONTENT_TYPES, DocumentFormat } from '../lib/parsing';
import { SITE } from './helpers/fixtures';

const exampleConfig = path.join(__dirname, '../../config/crawler.example.json');

describe('parseArgs', () => {
  it('should default to crawl', () => {
    expect(parseArgs([])).toEqual({ command: 'crawl', fresh: false, help: false });
  });

  it('should read the command and its options', () => {
    expect(parseArgs(['index', '--config', 'custom.json', '--max-pages', '25', '--fresh'])).toEqual({
      command: 'index',
      configPath: 'custom.json',
      maxPages: 25,
      fresh: true,
      help: false,
    });
  });

  it('should reject bad input', () => {
    expect(() => parseArgs(['--max-pages', '0'])).toThrow(new ConfigurationError('--max-pages needs a positive integer'));
    expect(() => parseArgs(['--config'])).toThrow('--config needs a file path');
    expect(() => parseArgs(['--verbose'])).toThrow('Unknown option: --verbose');
    expect(() => parseArgs(['crawl', 'index'])).toThrow('Unknown command: index');
  });
});

describe('runCli', () => {
  let log: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should validate a configuration file', async () => {
    await expect(runCli(['validate', '--config', exampleConfig])).resolves.toBe(0);
    expect(log).toHaveBeenCalledWith(`✅ Configuration ${exampleConfig} is valid`);
  });

  it('should exit with 1 when the configuration is missing', async () => {
    const missing = path.join(os.tmpdir(), 'no-such-crawler-config.json');

    await expect(runCli(['validate', '--config', missing])).resolves.toBe(1);
    expect(error).toHaveBeenCalledWith(`❌ Config file not found: ${missing}`);
  });

  it('should print help', async () => {
    await expect(runCli(['--help'])).resolves.toBe(0);
    expect(log).toHaveBeenCalledTimes(1);
  });

  it('should re-chunk existing output with the index command', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-index-'));
    try {
      const outputPath = path.join(dir, 'documents.jsonl');
      const configPath = path.join(dir, 'crawler.json');
      await fs.writeFile(
        configPath,
        JSON.stringify({
          seeds: [`${SITE}/2024/en/policy.html`],
          allowed_hosts: ['www.policy.example.test'],
          storage: { output_jsonl: outputPath },
          rag: { chunk_size_tokens: 4, chunk_overlap_tokens: 1 },
        }),
        'utf8'
      );
      const store = new DocumentStore(outputPath);
      const text = 'one two three four five six';
      await store.save(
        [
          toDocumentRecord(
            {
              contentHash: 'sha256:aaa',
              chosenUrl: `${SITE}/2024/en/p1.html`,
              title: 'Numbers',
              text,
              format: DocumentFormat.HTML,
              contentType: CONTENT_TYPES[DocumentFormat.HTML],
              metadata: { year: 2024, language: 'en', pageNumber: 1, section: null, sourcePath: null },
              aliasUrls: new Set(),
              crawledAt: new Date(0),
            },
            []
          ),
        ],
        {}
      );

      await expect(runCli(['index', '--config', configPath])).resolves.toBe(0);

      const { records } = await store.load();
      expect(records[0].chunks.map((chunk) => chunk.content)).toEqual(['one two three four ', 'four five six']);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
