import 'dotenv/config';

function env(key: string, defaultValue?: string): string {
  const value = process.env[key] ?? defaultValue;
  if (value === undefined) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function envInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be an integer, got: ${value}`);
  }
  return parsed;
}

function envFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseFloat(value);
  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
  }
  return parsed;
}

export const config = {
  database: {
    url: env('DATABASE_URL', './data/article-quality.db'),
  },

  server: {
    port: envInt('PORT', 3007),
    host: env('HOST', '0.0.0.0'),
    nodeEnv: env('NODE_ENV', 'development'),
  },

  auth: {
    jwtSecret: env('JWT_SECRET', 'article-quality-dev-secret-change-in-production'),
    jwtExpiresIn: env('JWT_EXPIRES_IN', '7d'),
  },

  quality: {
    version: env('QUALITY_VERSION', '1.0'),
    staleAfterDays: envInt('QUALITY_STALE_AFTER_DAYS', 7),
    batchLimit: envInt('QUALITY_BATCH_LIMIT', 100),
    batchConcurrency: envInt('QUALITY_BATCH_CONCURRENCY', 1),
    insightsDays: envInt('QUALITY_INSIGHTS_DAYS', 30),
    categoryWindowDays: envInt('QUALITY_CATEGORY_WINDOW_DAYS', 30),
  },

  preprocessing: {
    wordsPerMinute: envFloat('READING_WORDS_PER_MINUTE', 200),
    maxKeywords: envInt('MAX_KEYWORDS', 20),
  },

  subscription: {
    suggestionHistorySize: envInt('SUBSCRIPTION_SUGGESTION_HISTORY', 50),
  },
} as const;

export function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (config.auth.jwtSecret.includes('dev-secret')) {
    warnings.push('JWT_SECRET is using the development default; change it in production');
  }
  if (config.quality.batchConcurrency < 1) {
    errors.push('QUALITY_BATCH_CONCURRENCY must be at least 1');
  }
  if (config.quality.batchLimit < 1) {
    errors.push('QUALITY_BATCH_LIMIT must be at least 1');
  }
  if (config.preprocessing.wordsPerMinute <= 0) {
    errors.push('READING_WORDS_PER_MINUTE must be positive');
  }

  if (config.server.nodeEnv === 'production') {
    if (config.auth.jwtSecret.includes('dev-secret')) {
      errors.push('JWT_SECRET must be changed in production');
    }
  }

  for (const warning of warnings) {
    console.warn(`[config] WARNING: ${warning}`);
  }

  if (errors.length > 0) {
    throw new Error(`Configuration errors:\n${errors.map((e) => `  - ${e}`).join('\n')}`);
  }
}
