import { readFileSync } from 'node:fs';
import path from 'node:path';
import JSON5 from 'json5';
import { ConfigSchema, type AppConfig, type PublicConfig, getPublicConfig as getPublicConfigShared } from '../../shared/config';

const numberFromEnv = (value: string | undefined, fallback: number): number => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

const booleanFromEnv = (value: string | undefined, fallback: boolean): boolean => {
  if (value == null || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isMissingFile = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';

export type { AppConfig, PublicConfig };

export type Env = Record<string, string | undefined>;

export const DEFAULT_PIPELINE_CONFIG_PATH = path.join('config', 'pipeline.json5');
export const DEFAULT_TECHNICAL_TERMS_PATH = path.join('config', 'technical-terms.json');

export interface PipelineFiles {
  pipeline: Record<string, unknown>;
  technicalTerms: string[];
}

/**
 * Reads the pipeline tables (filter thresholds, credibility, keywords, routing) from a JSON5 file.
 * A missing file yields an empty object so schema defaults apply.
 */
export const readPipelineFile = (filePath: string): Record<string, unknown> => {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return {};
    }
    throw error;
  }
  const parsed: unknown = JSON5.parse(text);
  if (!isRecord(parsed)) {
    throw new Error(`Pipeline config must be an object: ${filePath}`);
  }
  return parsed;
};

export const readTermsFile = (filePath: string): string[] => {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return [];
    }
    throw error;
  }
  const parsed: unknown = JSON5.parse(text);
  if (!Array.isArray(parsed)) {
    throw new Error(`Term list must be an array: ${filePath}`);
  }
  return parsed.filter((term): term is string => typeof term === 'string' && term.trim() !== '');
};

export const deepFreeze = <T>(value: T): T => {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
};

export const buildConfig = (env: Env, files: PipelineFiles, cwd: string): AppConfig => {
  const pipelineFile = files.pipeline;
  const environment = (env.NODE_ENV || 'development').trim().toLowerCase();
  const rawRoot = env.RAW_DATA_ROOT || path.join(cwd, 'raw_data');
  const rootDir = path.resolve(rawRoot);

  const fileRouting = isRecord(pipelineFile.routing) ? pipelineFile.routing : {};
  const fileDifficulty = isRecord(fileRouting.difficulty) ? fileRouting.difficulty : {};
  const fileProviders = isRecord(pipelineFile.providers) ? pipelineFile.providers : {};
  const providerTimeout = (id: string, fallback: number): number => {
    const entry = fileProviders[id];
    return isRecord(entry) && typeof entry.timeoutMs === 'number' ? entry.timeoutMs : fallback;
  };

  const rawConfig = {
    environment: environment === 'production' ? 'production' : environment === 'test' ? 'test' : 'development',
    server: {
      port: numberFromEnv(env.PORT, 3001),
      heartbeatIntervalMs: numberFromEnv(env.HEARTBEAT_INTERVAL_MS, 15_000),
    },
    filter: pipelineFile.filter ?? {},
    scoring: pipelineFile.scoring ?? {},
    routing: {
      ...fileRouting,
      difficulty: {
        technicalTerms: files.technicalTerms,
        ...fileDifficulty,
        enabled: booleanFromEnv(env.DIFFICULTY_ROUTING, fileDifficulty.enabled === true),
      },
    },
    llm: {
      apiKey: env.GEMINI_API_KEY?.trim() || '',
      temperature: numberFromEnv(env.GEMINI_TEMPERATURE, 0.2),
      // Hard cap: never exceed 10 RPM regardless of environment value
      requestsPerMinute: Math.max(1, Math.min(10, numberFromEnv(env.GEMINI_REQUESTS_PER_MINUTE, 10))),
      summaryLanguage: env.SUMMARY_LANGUAGE?.trim().toLowerCase() === 'en' ? 'en' : 'ja',
      maxOutputTokens: numberFromEnv(env.SUMMARY_MAX_OUTPUT_TOKENS, 300),
      providers: {
        'gemini-pro': {
          model: env.GEMINI_PRO_MODEL?.trim() || 'gemini-2.5-pro',
          timeoutMs: providerTimeout('gemini-pro', 45_000),
        },
        'gemini-flash': {
          model: env.GEMINI_FLASH_MODEL?.trim() || 'gemini-2.5-flash',
          timeoutMs: providerTimeout('gemini-flash', 20_000),
        },
        'gemini-flash-lite': {
          model: env.GEMINI_FLASH_LITE_MODEL?.trim() || 'gemini-2.5-flash-lite',
          timeoutMs: providerTimeout('gemini-flash-lite', 15_000),
        },
      },
    },
    pipeline: {
      routerConcurrency: numberFromEnv(env.ROUTER_CONCURRENCY, 4),
      runTimeoutMs: numberFromEnv(env.RUN_TIMEOUT_MS, 300_000),
    },
    persistence: {
      mode: env.PERSISTENCE_MODE === 'none' ? 'none' : 'fs',
      rootDir,
      normalizedDir: path.join(rootDir, 'normalized'),
      outputsDir: path.join(rootDir, 'outputs'),
      usageDir: path.join(rootDir, 'usage'),
      summariesDir: path.join(rootDir, 'summaries'),
    },
    observability: {
      logLevel: (env.LOG_LEVEL || 'info').toLowerCase(),
    },
  };

  return deepFreeze(ConfigSchema.parse(rawConfig));
};

export const loadConfig = (env: Env = process.env, cwd: string = process.cwd()): AppConfig => {
  const pipelinePath = path.resolve(cwd, env.PIPELINE_CONFIG_PATH || DEFAULT_PIPELINE_CONFIG_PATH);
  const termsPath = path.resolve(cwd, env.TECHNICAL_TERMS_PATH || DEFAULT_TECHNICAL_TERMS_PATH);
  return buildConfig(env, { pipeline: readPipelineFile(pipelinePath), technicalTerms: readTermsFile(termsPath) }, cwd);
};

export const getPublicConfig = (config: AppConfig): PublicConfig => getPublicConfigShared(config);
