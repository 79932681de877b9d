import dotenv from 'dotenv';

dotenv.config();

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Crawler configuration file (JSON, validated by crawler.config.ts)
  CRAWLER_CONFIG: process.env.CRAWLER_CONFIG || 'config/crawler.json',

  // Overrides applied on top of the JSON configuration
  USER_AGENT: process.env.USER_AGENT,
  MAX_PAGES: process.env.MAX_PAGES ? parseInt(process.env.MAX_PAGES, 10) : undefined,

  // Per-task console.debug lines
  VERBOSE: process.env.VERBOSE === 'true', // Default false
} as const;

export default env;
