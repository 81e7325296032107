/**
 * Configuration Module
 *
 * Loads and validates environment variables for video-qa.
 * Uses Zod for runtime validation with sensible defaults.
 *
 * Unlike a module-level singleton, configuration is produced by
 * `loadConfig()` and passed explicitly into the pipeline, the HTTP
 * service and the CLI, so the core never reads `process.env` itself.
 * The CLI entry point loads `.env` through dotenv before calling it.
 *
 * @module config
 */

import { z } from 'zod';
import { getModelConfig, DEFAULT_COMPLETION_BASE_URL, type ModelConfig } from './models.js';

// ============================================================================
// Schema
// ============================================================================

const DEFAULT_LANGUAGES = 'es,en';
const DEFAULT_CORS_ORIGINS = 'http://localhost:*,chrome-extension://*';

/**
 * Split a comma-separated variable into trimmed, non-empty entries.
 */
function commaList(fallback: string) {
  return z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
    )
    .pipe(z.array(z.string()).min(1, 'must list at least one value'));
}

function positiveInt(fallback: number) {
  return z.coerce.number().int().positive().default(fallback);
}

// Environment schema with optional values and defaults
const envSchema = z.object({
  // API key (optional at load time; required only to call the model)
  GROQ_API_KEY: z.string().optional(),

  // Completion service
  COMPLETION_MODEL: z.string().optional(),
  COMPLETION_BASE_URL: z.string().url().optional(),
  COMPLETION_TIMEOUT_MS: positiveInt(60000),

  // Subtitle retrieval
  TRANSCRIPT_LANGUAGES: commaList(DEFAULT_LANGUAGES),
  TRANSCRIPT_TIMEOUT_MS: positiveInt(10000),
  YTDLP_BIN: z.string().default('yt-dlp'),

  // Chunking thresholds
  CHUNK_MAX_SECONDS: z.coerce.number().positive().default(30),
  CHUNK_MAX_CHARS: positiveInt(500),

  // HTTP service
  PORT: z.coerce.number().int().min(1).max(65535).default(8000),
  CORS_ORIGINS: commaList(DEFAULT_CORS_ORIGINS),
});

// ============================================================================
// Types
// ============================================================================

/**
 * Application configuration, injected into every entry point.
 */
export interface AppConfig {
  /** Groq API key */
  apiKey: string | undefined;

  completion: {
    model: ModelConfig;
    /** OpenAI-compatible endpoint */
    baseUrl: string;
    timeoutMs: number;
  };

  transcript: {
    /** Preferred subtitle languages, in order */
    languages: readonly string[];
    /** Timeout for the primary lookup and the subtitle download */
    timeoutMs: number;
    ytdlpBin: string;
  };

  chunking: {
    maxSeconds: number;
    maxChars: number;
  };

  server: {
    port: number;
    /** Allowed origin patterns (`*` matches any run of characters) */
    corsOrigins: readonly string[];
  };
}

/**
 * Error thrown when configuration is invalid or a required value is missing.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Treat blank variables (`FOO=`) as unset so defaults apply.
 */
function dropBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }
  return cleaned;
}

/**
 * Build the application configuration from environment variables.
 *
 * @param env - Environment to read (default: `process.env`)
 * @throws ConfigurationError listing every invalid variable
 *
 * @example
 * ```typescript
 * const config = loadConfig();
 * const service = createQaService(config);
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parseResult = envSchema.safeParse(dropBlankValues(env));

  if (!parseResult.success) {
    const issues = parseResult.error.issues.map(
      (issue) => `${issue.path.join('.')}: ${issue.message}`
    );
    throw new ConfigurationError(
      `Invalid environment variables: ${issues.join('; ')}`,
      issues
    );
  }

  const parsed = parseResult.data;
  const model = getModelConfig(parsed.COMPLETION_MODEL);

  return {
    apiKey: parsed.GROQ_API_KEY,

    completion: {
      model,
      baseUrl: parsed.COMPLETION_BASE_URL ?? DEFAULT_COMPLETION_BASE_URL,
      timeoutMs: parsed.COMPLETION_TIMEOUT_MS,
    },

    transcript: {
      languages: parsed.TRANSCRIPT_LANGUAGES,
      timeoutMs: parsed.TRANSCRIPT_TIMEOUT_MS,
      ytdlpBin: parsed.YTDLP_BIN,
    },

    chunking: {
      maxSeconds: parsed.CHUNK_MAX_SECONDS,
      maxChars: parsed.CHUNK_MAX_CHARS,
    },

    server: {
      port: parsed.PORT,
      corsOrigins: parsed.CORS_ORIGINS,
    },
  };
}

/**
 * Get the completion API key or throw if not configured
 */
export function requireApiKey(config: AppConfig): string {
  if (!config.apiKey) {
    throw new ConfigurationError(
      'Missing required API key: GROQ_API_KEY. Please set it in your .env file.'
    );
  }
  return config.apiKey;
}

// Re-export model configuration
export * from './models.js';
