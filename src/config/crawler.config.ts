/**
 * Crawler Configuration
 * JSON configuration file schema, defaults and loading
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { env } from './env';
import { ConfigurationError, isMissingFile } from '../lib/errors';
import { extractHost, isAllowedHost } from '../lib/crawling';
import { DocumentFormat } from '../lib/parsing';
import type { HostRateLimitConfig } from '../lib/rate-limit';
import type { RetryPolicy, TimeoutSettings } from '../lib/fetching';
import type { ChunkingConfig } from '../lib/chunking';

const RateLimitsSchema = z.object({
  per_host_rps: z.number().positive('rate_limits.per_host_rps must be positive').default(1),
  per_host_concurrency: z.number().int().min(1, 'rate_limits.per_host_concurrency must be at least 1').default(2),
  global_concurrency: z.number().int().min(1, 'rate_limits.global_concurrency must be at least 1').default(4),
  burst: z.number().int().min(1, 'rate_limits.burst must be at least 1').default(1),
}).strict();

const TimeoutsSchema = z.object({
  connect_ms: z.number().int().min(1, 'timeouts.connect_ms must be at least 1').default(10000),
  read_ms: z.number().int().min(1, 'timeouts.read_ms must be at least 1').default(30000),
  total_ms: z.number().int().min(1, 'timeouts.total_ms must be at least 1').default(45000),
}).strict();

const RetriesSchema = z.object({
  max_retries: z.number().int().min(0, 'retries.max_retries cannot be negative').default(3),
  base_delay_ms: z.number().int().min(0, 'retries.base_delay_ms cannot be negative').default(1000),
  max_delay_ms: z.number().int().min(0, 'retries.max_delay_ms cannot be negative').default(30000),
  jitter_ms: z.number().int().min(0, 'retries.jitter_ms cannot be negative').default(1000),
}).strict();

const QualitySchema = z.object({
  min_text_chars: z.number().int().min(0, 'quality.min_text_chars cannot be negative').default(20),
}).strict();

const StorageSchema = z.object({
  save_html: z.boolean().default(true),
  save_pdf: z.boolean().default(true),
  raw_dir: z.string().min(1, 'storage.raw_dir cannot be empty').default('data/raw'),
  output_jsonl: z.string().min(1, 'storage.output_jsonl cannot be empty').default('data/processed/documents.jsonl'),
  state_file: z.string().min(1, 'storage.state_file cannot be empty').default('data/state/frontier.json'),
}).strict();

const DeduplicationSchema = z.object({
  preference: z.nativeEnum(DocumentFormat, {
    errorMap: () => ({ message: 'deduplication.preference must be "html" or "pdf"' }),
  }).default(DocumentFormat.HTML),
  skip_existing_files: z.boolean().default(true),
  enable_resume: z.boolean().default(true),
}).strict();

const RagSchema = z.object({
  chunk_size_tokens: z.number().int().min(1, 'rag.chunk_size_tokens must be at least 1').default(1000),
  chunk_overlap_tokens: z.number().int().min(0, 'rag.chunk_overlap_tokens cannot be negative').default(150),
  respect_boundaries: z.boolean().default(true),
  boundary_search_tokens: z.number().int().min(0, 'rag.boundary_search_tokens cannot be negative').default(200),
}).strict();

export const CrawlerConfigFileSchema = z.object({
  seeds: z.array(z.string().url('seeds must be absolute URLs')).min(1, 'seeds must contain at least one URL'),
  allowed_hosts: z.array(z.string().min(1, 'allowed_hosts cannot contain empty names')).min(1, 'allowed_hosts must contain at least one host'),
  years: z.array(z.number().int().min(1990).max(2100)).default([]),
  languages: z.array(z.string().min(1)).default([]),
  rate_limits: RateLimitsSchema.default({}),
  depth_limit: z.number().int().min(0, 'depth_limit cannot be negative').default(5),
  max_pages: z.number().int().min(1, 'max_pages must be at least 1').default(200),
  respect_robots_txt: z.boolean().default(true),
  timeouts: TimeoutsSchema.default({}),
  retries: RetriesSchema.default({}),
  user_agent: z.string().min(1, 'user_agent cannot be empty').default('PolicyCrawler/1.0'),
  quality: QualitySchema.default({}),
  storage: StorageSchema.default({}),
  deduplication: DeduplicationSchema.default({}),
  rag: RagSchema.default({}),
}).strict().superRefine((config, ctx) => {
  if (config.rag.chunk_overlap_tokens >= config.rag.chunk_size_tokens) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['rag', 'chunk_overlap_tokens'],
      message: 'rag.chunk_overlap_tokens must be smaller than rag.chunk_size_tokens',
    });
  }
  config.seeds.forEach((seed, index) => {
    if (!isAllowedHost(seed, config.allowed_hosts)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['seeds', index],
        message: `seed host ${extractHost(seed)} is not in allowed_hosts`,
      });
    }
  });
});

export type CrawlerConfigFile = z.infer<typeof CrawlerConfigFileSchema>;

export interface StorageSettings {
  saveHtml: boolean;
  savePdf: boolean;
  rawDir: string;
  outputJsonl: string;
  stateFile: string;
}

export interface DeduplicationSettings {
  preference: DocumentFormat;
  skipExistingFiles: boolean;
  enableResume: boolean;
}

/**
 * Validated configuration as used by the crawler
 */
export interface CrawlerConfig {
  seeds: string[];
  allowedHosts: string[];
  years: number[];       // Empty admits every year
  languages: string[];   // Empty admits every language
  rateLimits: Required<HostRateLimitConfig>;
  depthLimit: number;
  maxPages: number;
  respectRobotsTxt: boolean;
  timeouts: TimeoutSettings;
  retry: RetryPolicy;
  userAgent: string;
  minTextChars: number;
  storage: StorageSettings;
  deduplication: DeduplicationSettings;
  rag: ChunkingConfig;
}

/**
 * Values that replace the file's settings (environment, command line)
 */
export interface ConfigOverrides {
  userAgent?: string;
  maxPages?: number;
}

export function envOverrides(): ConfigOverrides {
  return { userAgent: env.USER_AGENT, maxPages: env.MAX_PAGES };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function formatZodError(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Validate an already-parsed configuration object
 */
export function parseCrawlerConfig(
  raw: unknown,
  source: string = '(inline)',
  overrides: ConfigOverrides = {}
): CrawlerConfig {
  const input = isRecord(raw)
    ? {
        ...raw,
        ...(overrides.userAgent !== undefined ? { user_agent: overrides.userAgent } : {}),
        ...(overrides.maxPages !== undefined ? { max_pages: overrides.maxPages } : {}),
      }
    : raw;

  const result = CrawlerConfigFileSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid config in ${source}:`, formatZodError(result.error));
  }
  return toCrawlerConfig(result.data);
}

/**
 * Read, validate and convert the JSON configuration file
 */
export async function loadCrawlerConfig(
  path: string = env.CRAWLER_CONFIG,
  overrides: ConfigOverrides = envOverrides()
): Promise<CrawlerConfig> {
  let content: string;
  try {
    content = await readFile(path, 'utf8');
  } catch (error: unknown) {
    if (isMissingFile(error)) {
      throw new ConfigurationError(`Config file not found: ${path}`);
    }
    throw new ConfigurationError(`Could not read config file ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error: unknown) {
    throw new ConfigurationError(`Invalid JSON in ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  return parseCrawlerConfig(raw, path, overrides);
}

function toCrawlerConfig(file: CrawlerConfigFile): CrawlerConfig {
  return {
    seeds: file.seeds,
    allowedHosts: file.allowed_hosts.map((host) => host.toLowerCase()),
    years: file.years,
    languages: file.languages,
    rateLimits: {
      perHostRps: file.rate_limits.per_host_rps,
      perHostConcurrency: file.rate_limits.per_host_concurrency,
      globalConcurrency: file.rate_limits.global_concurrency,
      burst: file.rate_limits.burst,
    },
    depthLimit: file.depth_limit,
    maxPages: file.max_pages,
    respectRobotsTxt: file.respect_robots_txt,
    timeouts: {
      connectMs: file.timeouts.connect_ms,
      readMs: file.timeouts.read_ms,
      totalMs: file.timeouts.total_ms,
    },
    retry: {
      maxRetries: file.retries.max_retries,
      baseDelayMs: file.retries.base_delay_ms,
      maxDelayMs: file.retries.max_delay_ms,
      jitterMs: file.retries.jitter_ms,
    },
    userAgent: file.user_agent,
    minTextChars: file.quality.min_text_chars,
    storage: {
      saveHtml: file.storage.save_html,
      savePdf: file.storage.save_pdf,
      rawDir: file.storage.raw_dir,
      outputJsonl: file.storage.output_jsonl,
      stateFile: file.storage.state_file,
    },
    deduplication: {
      preference: file.deduplication.preference,
      skipExistingFiles: file.deduplication.skip_existing_files,
      enableResume: file.deduplication.enable_resume,
    },
    rag: {
      chunkSizeTokens: file.rag.chunk_size_tokens,
      chunkOverlapTokens: file.rag.chunk_overlap_tokens,
      respectBoundaries: file.rag.respect_boundaries,
      boundarySearchTokens: file.rag.boundary_search_tokens,
    },
  };
}
