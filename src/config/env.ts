import dotenv from 'dotenv';

dotenv.config();

export const env = {
  // Server
  PORT: parseInt(process.env.PORT || '3001', 10),
  NODE_ENV: process.env.NODE_ENV || 'development',

  // CORS
  CLIENT_URL: process.env.CLIENT_URL || 'http://localhost:5173',

  // Fetch cache
  CACHE_DIR: process.env.CACHE_DIR || 'cache',
  CACHE_MODE: process.env.CACHE_MODE || 'enabled',

  // Crawling
  CRAWL_MAX_PAGES: parseInt(process.env.CRAWL_MAX_PAGES || '40', 10),
  CRAWL_MAX_DEPTH: parseInt(process.env.CRAWL_MAX_DEPTH || '3', 10),
  CRAWL_TIMEOUT_SECONDS: parseInt(process.env.CRAWL_TIMEOUT_SECONDS || '12', 10),
  CRAWL_MAX_REDIRECTS: parseInt(process.env.CRAWL_MAX_REDIRECTS || '5', 10),
  CRAWL_MAX_CONTENT_BYTES: parseInt(process.env.CRAWL_MAX_CONTENT_BYTES || String(5 * 1024 * 1024), 10), // 5 MiB
  CRAWL_MIN_HTML_LENGTH: parseInt(process.env.CRAWL_MIN_HTML_LENGTH || '100', 10),
  USER_AGENT: process.env.USER_AGENT || 'DocModuleExtractor/1.0 (+documentation crawler)',

  // Inference
  SIMILARITY_THRESHOLD: parseFloat(process.env.SIMILARITY_THRESHOLD || '0.8'),

  // Rate Limiting
  RATE_LIMIT_ENABLED: process.env.RATE_LIMIT_ENABLED !== 'false', // Default true
  RATE_LIMIT_WINDOW_MS: parseInt(process.env.RATE_LIMIT_WINDOW_MS || '60000', 10), // 1 minute
  RATE_LIMIT_MAX_REQUESTS: parseInt(process.env.RATE_LIMIT_MAX_REQUESTS || '10', 10), // crawls are expensive
} as const;

export default env;
