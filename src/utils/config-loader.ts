/**
 * Config Loader - Single Source of Truth
 *
 * Loads the pipeline configuration from config/account-plan.yaml.
 * The YAML file is the authoritative source for:
 * - The required-field contract of generated plans (plan.sections)
 * - Token budgets for each collaborator call
 * - Plan store location and format version
 * - LLM provider selection and models
 *
 * Environment variables override individual settings; see applyEnvOverrides.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { parse } from 'yaml';
import { z } from 'zod';
import { log } from '../logging.js';
import { PipelineError } from '../types/errors.js';
import { parseWithSchema } from './validation.js';
import type { PlanSectionSpec } from '../types/research.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const CONFIG_FILE_NAME = 'account-plan.yaml';

const providerSchema = z.enum(['auto', 'groq', 'gemini', 'custom', 'anthropic', 'openai']);

export type LLMProvider = z.infer<typeof providerSchema>;
export type ConcreteProvider = Exclude<LLMProvider, 'auto'>;

export interface GenerationConfig {
  synthesisMaxTokens: number;
  planMaxTokens: number;
  regenerationMaxTokens: number;
  chatMaxTokens: number;
  /** Prefix of the research corpus handed to section regeneration */
  researchContextChars: number;
}

export interface StorageConfig {
  planFile: string;
  formatVersion: string;
  exportDir: string;
}

export interface LLMConfig {
  provider: LLMProvider;
  mock: boolean;
  mockDelayMs: number;
  models: Record<ConcreteProvider, string>;
}

export interface SourcesConfig {
  webMaxResults: number;
  newsPageSize: number;
  wikiMaxChars: number;
  timeoutMs: number;
  newsApiKey?: string;
}

export interface AccountPlanConfig {
  plan: { sections: PlanSectionSpec[] };
  generation: GenerationConfig;
  storage: StorageConfig;
  llm: LLMConfig;
  sources: SourcesConfig;
}

export const DEFAULT_PLAN_SECTIONS: readonly PlanSectionSpec[] = [
  { key: 'company_overview', description: 'Brief 2-3 sentence overview of the company, their industry, and current market position' },
  { key: 'key_stakeholders', description: 'List of decision makers, influencers, and key contacts with their roles and relevance. Include names if available from research.' },
  { key: 'pain_points', description: '3-5 major business challenges or pain points the company is facing based on the research' },
  { key: 'value_proposition', description: 'How we can help address their pain points and add value to their business. Be specific and actionable.' },
  { key: 'engagement_strategy', description: 'Recommended approach for engaging with this account, including timing, channels, and key messaging' },
  { key: 'success_metrics', description: 'Key performance indicators and metrics to track success of the engagement. Include specific, measurable goals.' },
  { key: 'next_steps', description: 'Specific action items with timeline for next 30-60-90 days. Be concrete and actionable.' },
];

// ============================================================================
// YAML schema
// ============================================================================

// An empty YAML key (`generation:`) parses as null
const nullAsMissing = (value: unknown): unknown => (value === null ? undefined : value);

function mapping<T extends z.ZodRawShape>(shape: T) {
  return z.preprocess(value => value ?? {}, z.object(shape));
}

function positiveInt(fallback: number) {
  return z.preprocess(nullAsMissing, z.number().int().positive().default(fallback));
}

function nonNegativeInt(fallback: number) {
  return z.preprocess(nullAsMissing, z.number().int().nonnegative().default(fallback));
}

// YAML reads an unquoted 1.0 as a number
function text(fallback: string) {
  return z.preprocess(
    nullAsMissing,
    z.union([z.string().trim().min(1), z.number().transform(String)]).default(fallback)
  );
}

function flag(fallback: boolean) {
  return z.preprocess(nullAsMissing, z.boolean().default(fallback));
}

const sectionEntrySchema = z.union([
  z.string().trim().min(1).transform(key => ({ key, description: '' })),
  z.object({
    key: z.union([z.string(), z.number().transform(String)]).pipe(z.string().trim().min(1)),
    description: z.unknown().transform(value => (typeof value === 'string' ? value.trim() : '')),
  }),
]);

const planSectionsSchema = z
  .array(sectionEntrySchema)
  .min(1, 'must list at least one section')
  .superRefine((sections, ctx) => {
    const seen = new Set<string>();
    sections.forEach((section, index) => {
      if (seen.has(section.key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'key'],
          message: `duplicate section key "${section.key}"`,
        });
      }
      seen.add(section.key);
    });
  });

const configSchema = z.preprocess(
  value => value ?? {},
  z.object({
    plan: mapping({
      sections: z.preprocess(
        nullAsMissing,
        planSectionsSchema.default(() => DEFAULT_PLAN_SECTIONS.map(section => ({ ...section })))
      ),
    }),
    generation: mapping({
      synthesis_max_tokens: positiveInt(2048),
      plan_max_tokens: positiveInt(4096),
      regeneration_max_tokens: positiveInt(1024),
      chat_max_tokens: positiveInt(1024),
      research_context_chars: positiveInt(1000),
    }),
    storage: mapping({
      plan_file: text('.data/account-plans.json'),
      format_version: text('1.0'),
      export_dir: text('.data/exports'),
    }),
    llm: mapping({
      provider: z.preprocess(
        value => (value === null || value === '' ? undefined : value),
        providerSchema.default('auto')
      ),
      mock: flag(false),
      mock_delay_ms: nonNegativeInt(250),
      models: mapping({
        groq: text('llama-3.3-70b-versatile'),
        gemini: text('gemini-2.5-flash'),
        custom: text('gpt-4'),
        anthropic: text('claude-sonnet-4-20250514'),
        openai: text('gpt-4-turbo-preview'),
      }),
    }),
    sources: mapping({
      web_max_results: positiveInt(8),
      news_page_size: positiveInt(5),
      wiki_max_chars: positiveInt(1000),
      timeout_ms: positiveInt(15000),
    }),
  })
);

// ============================================================================
// Loader Functions
// ============================================================================

/**
 * Get the config directory path. Works from src/utils and from the compiled
 * dist/src/utils alike.
 */
export function getConfigDir(): string {
  const candidates = [
    path.join(__dirname, '../../config'),
    path.join(__dirname, '../../../config'),
  ];
  const found = candidates.find(dir => fs.existsSync(path.join(dir, CONFIG_FILE_NAME)));
  return found ?? path.join(process.cwd(), 'config');
}

/**
 * Build a config from parsed YAML. Missing keys take their defaults; relative
 * paths resolve against the working directory.
 */
export function configFromYAML(document: unknown): AccountPlanConfig {
  const { plan, generation, storage, llm, sources } = parseWithSchema(
    configSchema,
    document,
    'CONFIG_INVALID',
    'Invalid configuration: '
  );

  return {
    plan: { sections: plan.sections },
    generation: {
      synthesisMaxTokens: generation.synthesis_max_tokens,
      planMaxTokens: generation.plan_max_tokens,
      regenerationMaxTokens: generation.regeneration_max_tokens,
      chatMaxTokens: generation.chat_max_tokens,
      researchContextChars: generation.research_context_chars,
    },
    storage: {
      planFile: path.resolve(storage.plan_file),
      formatVersion: storage.format_version,
      exportDir: path.resolve(storage.export_dir),
    },
    llm: {
      provider: llm.provider,
      mock: llm.mock,
      mockDelayMs: llm.mock_delay_ms,
      models: { ...llm.models },
    },
    sources: {
      webMaxResults: sources.web_max_results,
      newsPageSize: sources.news_page_size,
      wikiMaxChars: sources.wiki_max_chars,
      timeoutMs: sources.timeout_ms,
    },
  };
}

export function defaultConfig(): AccountPlanConfig {
  return configFromYAML(undefined);
}

/**
 * Environment variables win over the YAML file
 */
export function applyEnvOverrides(config: AccountPlanConfig, env: NodeJS.ProcessEnv): AccountPlanConfig {
  const mockFlag = env.ACCOUNT_PLAN_MOCK_LLM?.toLowerCase();
  const newsApiKey = env.NEWSAPI_KEY?.trim();

  return {
    ...config,
    storage: {
      ...config.storage,
      planFile: env.ACCOUNT_PLAN_STORE ? path.resolve(env.ACCOUNT_PLAN_STORE) : config.storage.planFile,
      exportDir: env.ACCOUNT_PLAN_EXPORT_DIR ? path.resolve(env.ACCOUNT_PLAN_EXPORT_DIR) : config.storage.exportDir,
    },
    llm: {
      ...config.llm,
      provider: env.LLM_PROVIDER
        ? parseWithSchema(providerSchema, env.LLM_PROVIDER, 'CONFIG_INVALID', 'Invalid LLM_PROVIDER: ')
        : config.llm.provider,
      mock: mockFlag === undefined || mockFlag === '' ? config.llm.mock : mockFlag === 'true' || mockFlag === '1',
    },
    sources: {
      ...config.sources,
      newsApiKey: newsApiKey || config.sources.newsApiKey,
    },
  };
}

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load account-plan.yaml and apply environment overrides.
 * A missing file means built-in defaults; an unreadable or invalid one throws.
 */
export function loadConfig(options: LoadConfigOptions = {}): AccountPlanConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath
    ?? env.ACCOUNT_PLAN_CONFIG
    ?? path.join(getConfigDir(), CONFIG_FILE_NAME);

  if (!fs.existsSync(configPath)) {
    log(`Configuration not found at ${configPath}, using defaults`, 'warning');
    return applyEnvOverrides(defaultConfig(), env);
  }

  let document: unknown;
  try {
    document = parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new PipelineError('CONFIG_INVALID', `Could not parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`);
  }

  const config = applyEnvOverrides(configFromYAML(document), env);
  log('Configuration loaded', 'debug', {
    configPath,
    sections: config.plan.sections.map(s => s.key),
    provider: config.llm.provider,
    mock: config.llm.mock,
  });
  return config;
}
