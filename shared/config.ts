import { z } from 'zod';
import { CATEGORIES, DIFFICULTY_LEVELS, PROVIDER_IDS } from './types';

const providerIdSchema = z.enum(PROVIDER_IDS);
const categorySchema = z.enum(CATEGORIES);
const providerListSchema = z.array(providerIdSchema);

export const ProviderSettingsSchema = z.object({
  model: z.string().min(1),
  timeoutMs: z.number().int().positive(),
});

export const FilterSettingsSchema = z.object({
  minTitleLength: z.number().int().nonnegative().default(10),
  minBodyLength: z.number().int().nonnegative().default(50),
  maxAgeHours: z.number().positive().default(72),
  blockedMarkers: z.array(z.string().min(1)).default(['[Removed]']),
});

export const ScoringSettingsSchema = z.object({
  keywordPointsPerMatch: z.number().nonnegative().default(20),
  maxKeywordPoints: z.number().nonnegative().default(40),
  credibilityWeight: z.number().min(0).max(1).default(0.2),
  defaultCredibility: z.number().int().min(0).max(100).default(10),
  credibility: z.record(z.string(), z.number().int().min(0).max(100)).default({}),
  keywords: z.record(categorySchema, z.array(z.string().min(1))).default({}),
  inferCategory: z.boolean().default(false),
});

export const RoutingRuleSchema = z.object({
  category: categorySchema,
  task: z.literal('summarize'),
  providers: providerListSchema.min(1),
});

export const RoutingSettingsSchema = z.object({
  rules: z.array(RoutingRuleSchema).default([]),
  defaultProviders: providerListSchema.min(1).default(['gemini-flash', 'gemini-flash-lite', 'gemini-pro']),
  difficulty: z
    .object({
      enabled: z.boolean().default(false),
      technicalTerms: z.array(z.string().min(1)).default([]),
      mediumDensity: z.number().nonnegative().default(1),
      highDensity: z.number().nonnegative().default(3),
      tiers: z.record(z.enum(DIFFICULTY_LEVELS), providerListSchema).default({}),
    })
    .default({}),
});

export const ConfigSchema = z.object({
  environment: z.enum(['development', 'test', 'production']),
  server: z.object({
    port: z.number().int().positive().max(65535),
    heartbeatIntervalMs: z.number().int().positive(),
  }),
  filter: FilterSettingsSchema,
  scoring: ScoringSettingsSchema,
  routing: RoutingSettingsSchema,
  llm: z.object({
    apiKey: z.string(),
    temperature: z.number().min(0).max(2),
    requestsPerMinute: z.number().int().positive(),
    summaryLanguage: z.enum(['ja', 'en']),
    maxOutputTokens: z.number().int().positive(),
    providers: z.object({
      'gemini-pro': ProviderSettingsSchema,
      'gemini-flash': ProviderSettingsSchema,
      'gemini-flash-lite': ProviderSettingsSchema,
    }),
  }),
  pipeline: z.object({
    routerConcurrency: z.number().int().positive(),
    runTimeoutMs: z.number().int().nonnegative(),
  }),
  persistence: z.object({
    mode: z.enum(['fs', 'none']),
    rootDir: z.string().min(1),
    normalizedDir: z.string().min(1),
    outputsDir: z.string().min(1),
    usageDir: z.string().min(1),
    summariesDir: z.string().min(1),
  }),
  observability: z.object({
    logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type FilterSettings = z.infer<typeof FilterSettingsSchema>;
export type ScoringSettings = z.infer<typeof ScoringSettingsSchema>;
export type RoutingSettings = z.infer<typeof RoutingSettingsSchema>;
export type RoutingRule = z.infer<typeof RoutingRuleSchema>;
export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;

export interface PublicConfig {
  filter: FilterSettings;
  routing: {
    defaultProviders: RoutingSettings['defaultProviders'];
    rules: RoutingRule[];
    difficultyRouting: boolean;
  };
  pipeline: AppConfig['pipeline'];
  summaryLanguage: AppConfig['llm']['summaryLanguage'];
}

export const getPublicConfig = (config: AppConfig): PublicConfig => ({
  filter: config.filter,
  routing: {
    defaultProviders: config.routing.defaultProviders,
    rules: config.routing.rules,
    difficultyRouting: config.routing.difficulty.enabled,
  },
  pipeline: config.pipeline,
  summaryLanguage: config.llm.summaryLanguage,
});
