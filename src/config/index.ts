/**
 * Centralized Configuration Module
 *
 * Type-safe, validated access to environment variables. Study content
 * (attention pool, instruction trials, language) lives in the YAML study
 * file, see ./study.ts.
 */

import { z } from "zod";

/**
 * Custom boolean coercion that handles string "false" and "true"
 */
const booleanString = z
  .union([z.boolean(), z.string(), z.number()])
  .transform((val) => {
    if (typeof val === "boolean") return val;
    if (typeof val === "number") return val !== 0;
    const lower = val.toLowerCase().trim();
    if (lower === "false" || lower === "0" || lower === "") return false;
    return true;
  });

/**
 * Optional non-empty string; empty env values count as unset
 */
const optionalString = z
  .union([z.string(), z.undefined()])
  .transform((val) => (val === undefined || val.trim() === "" ? undefined : val.trim()));

/**
 * Optional positive integer; empty env values count as unset
 */
const optionalPositiveInt = z
  .union([z.string(), z.number(), z.undefined()])
  .transform((val, ctx) => {
    if (val === undefined || val === "") return undefined;
    const parsed = Number(val);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected a positive integer, received "${val}"`,
      });
      return z.NEVER;
    }
    return parsed;
  });

const optionalInt = z
  .union([z.string(), z.number(), z.undefined()])
  .transform((val, ctx) => {
    if (val === undefined || val === "") return undefined;
    const parsed = Number(val);
    if (!Number.isInteger(parsed)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected an integer, received "${val}"`,
      });
      return z.NEVER;
    }
    return parsed;
  });

/**
 * Comma-separated list
 */
const csvList = z
  .union([z.string(), z.undefined()])
  .transform((val) =>
    val
      ? val
          .split(",")
          .map((item) => item.trim())
          .filter((item) => item.length > 0)
      : []
  );

const Environment = z.enum(["development", "test", "production"]);

const LogLevel = z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]);

const Fraction = z.coerce.number().min(0).max(1);

/**
 * Configuration Schema
 */
const ConfigSchema = z
  .object({
    server: z.object({
      port: z.coerce.number().int().positive().default(3000),
      nodeEnv: Environment.default("development"),
      logLevel: LogLevel.default("info"),
      bodyLimitBytes: z.coerce.number().int().positive().default(64 * 1024),
      requestTimeoutMs: z.coerce.number().int().positive().default(30000),
      allowedOrigins: csvList,
      globalRateLimitRpm: z.coerce.number().int().positive().default(300),
    }),

    study: z.object({
      catalogPath: z.string().default("data/catalog.json"),
      studyConfigPath: z.string().default("config/study.yaml"),
      audioRoot: z.string().default("."),
      resultsDir: z.string().default("results"),
      localesDir: optionalString,
    }),

    sampling: z.object({
      sampleSizePerGroup: z.coerce.number().int().positive().default(5),
      numAttentionChecks: z.coerce.number().int().nonnegative().default(2),
      attentionWindowStart: Fraction.default(0.2),
      attentionWindowEnd: Fraction.default(0.9),
      seed: optionalInt,
    }),

    participants: z.object({
      maxParticipants: optionalPositiveInt,
      completionBaseUrl: z
        .string()
        .url()
        .default("https://app.prolific.com/submissions/complete"),
    }),

    session: z.object({
      ttlSeconds: z.coerce.number().int().positive().default(6 * 60 * 60),
      maxInMemory: z.coerce.number().int().positive().default(1000),
    }),

    redis: z.object({
      url: optionalString,
      namespace: z.string().default("listening-test"),
      tls: booleanString.default(false),
      connectTimeout: z.coerce.number().int().positive().default(10000),
      commandTimeout: z.coerce.number().int().positive().default(5000),
    }),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.sampling.attentionWindowStart > cfg.sampling.attentionWindowEnd) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["sampling", "attentionWindowStart"],
        message: "ATTENTION_WINDOW_START must not exceed ATTENTION_WINDOW_END",
      });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Parse and validate configuration from environment
 */
function parseConfig(): Config {
  const env = process.env;

  const rawConfig = {
    server: {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
      logLevel: env.LOG_LEVEL,
      bodyLimitBytes: env.BODY_LIMIT_BYTES,
      requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
      allowedOrigins: env.ALLOWED_ORIGINS,
      globalRateLimitRpm: env.GLOBAL_RATE_LIMIT_RPM,
    },
    study: {
      catalogPath: env.CATALOG_PATH,
      studyConfigPath: env.STUDY_CONFIG_PATH,
      audioRoot: env.AUDIO_ROOT,
      resultsDir: env.RESULTS_DIR,
      localesDir: env.LOCALES_DIR,
    },
    sampling: {
      sampleSizePerGroup: env.SAMPLE_SIZE_PER_GROUP,
      numAttentionChecks: env.NUM_ATTENTION_CHECKS,
      attentionWindowStart: env.ATTENTION_WINDOW_START,
      attentionWindowEnd: env.ATTENTION_WINDOW_END,
      seed: env.SAMPLER_SEED,
    },
    participants: {
      maxParticipants: env.MAX_PARTICIPANTS,
      completionBaseUrl: env.COMPLETION_BASE_URL,
    },
    session: {
      ttlSeconds: env.SESSION_TTL_SECONDS,
      maxInMemory: env.SESSION_MAX_IN_MEMORY,
    },
    redis: {
      url: env.REDIS_URL,
      namespace: env.REDIS_NAMESPACE,
      tls: env.REDIS_TLS,
      connectTimeout: env.REDIS_CONNECT_TIMEOUT,
      commandTimeout: env.REDIS_COMMAND_TIMEOUT,
    },
  };

  try {
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error("❌ Configuration validation failed:");
      console.error(JSON.stringify(error.issues, null, 2));
      throw new Error("Invalid configuration. Please check environment variables.");
    }
    throw error;
  }
}

/**
 * Lazy-initialized configuration using Proxy pattern
 *
 * Defers parsing until first property access so tests can stub the
 * environment before the config is read. Parsed once and cached.
 */
let _cachedConfig: Config | null = null;

function loadConfig(): Config {
  if (_cachedConfig === null) {
    _cachedConfig = parseConfig();
  }
  return _cachedConfig;
}

export const config: Config = new Proxy<Config>(Object.create(null), {
  get(_target, prop) {
    return Reflect.get(loadConfig(), prop);
  },

  ownKeys() {
    return Reflect.ownKeys(loadConfig());
  },

  getOwnPropertyDescriptor(_target, prop) {
    return Reflect.getOwnPropertyDescriptor(loadConfig(), prop);
  },

  has(_target, prop) {
    return prop in loadConfig();
  },
});

/**
 * Get configuration (for compatibility and testing)
 */
export function getConfig(): Config {
  return loadConfig();
}

/**
 * Reset cached configuration (for testing only)
 *
 * @internal
 */
export function _resetConfigCache(): void {
  _cachedConfig = null;
}

export function isProduction(): boolean {
  return config.server.nodeEnv === "production";
}
