import { existsSync, readFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { config as loadDotenv } from 'dotenv';
import type { DiffwardenConfig, Language, Severity } from './types.js';
import { isLanguage, isSeverity } from './types.js';

loadDotenv();

const PROJECT_ROOT = process.cwd();

export const DEFAULT_CONFIG: DiffwardenConfig = {
  version: '1.0',
  settings: {
    autoFix: false,
    // With the declared-order filter, critical keeps every finding
    severityThreshold: 'critical',
    focusLanguages: [],
  },
  comment: { marker: '<!-- diffwarden-review -->' },
  review: { defaultScope: 'HEAD' },
};

interface RawConfig {
  version?: unknown;
  settings?: {
    auto_fix?: unknown;
    severity_threshold?: unknown;
    focus_languages?: unknown;
  };
  comment?: { marker?: unknown };
  review?: { default_scope?: unknown };
}

function parseSeverityThreshold(raw: unknown): Severity {
  if (raw === undefined) return DEFAULT_CONFIG.settings.severityThreshold;
  if (isSeverity(raw)) return raw;
  console.warn(`[config] Unknown severity_threshold "${String(raw)}", using "${DEFAULT_CONFIG.settings.severityThreshold}"`);
  return DEFAULT_CONFIG.settings.severityThreshold;
}

function parseFocusLanguages(raw: unknown): Language[] {
  if (!Array.isArray(raw)) return [];
  const languages: Language[] = [];
  for (const item of raw) {
    if (isLanguage(item)) {
      languages.push(item);
    } else {
      console.warn(`[config] Ignoring unknown focus language "${String(item)}"`);
    }
  }
  return languages;
}

export function parseDiffwardenConfig(raw: string): DiffwardenConfig {
  const yml: RawConfig | null = parseYaml(raw);
  if (!yml || typeof yml !== 'object') {
    return DEFAULT_CONFIG;
  }

  return {
    version: typeof yml.version === 'string' ? yml.version : DEFAULT_CONFIG.version,
    settings: {
      autoFix: yml.settings?.auto_fix === true,
      severityThreshold: parseSeverityThreshold(yml.settings?.severity_threshold),
      focusLanguages: parseFocusLanguages(yml.settings?.focus_languages),
    },
    comment: {
      marker: typeof yml.comment?.marker === 'string' ? yml.comment.marker : DEFAULT_CONFIG.comment.marker,
    },
    review: {
      defaultScope: typeof yml.review?.default_scope === 'string'
        ? yml.review.default_scope
        : DEFAULT_CONFIG.review.defaultScope,
    },
  };
}

function loadDiffwardenConfig(): DiffwardenConfig {
  const configPath = path.resolve(PROJECT_ROOT, '.diffwarden', 'config.yml');
  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }
  return parseDiffwardenConfig(readFileSync(configPath, 'utf-8'));
}

export const diffwardenConfig = loadDiffwardenConfig();

export type FixProviderType = 'gemini' | 'off';
export type FixProviderRaw = 'auto' | 'gemini' | 'off';

export interface FixProviderConfig {
  configured: FixProviderType;
  effective: FixProviderType;
  geminiConfigured: boolean;
}

const VALID_PROVIDERS: readonly FixProviderRaw[] = ['auto', 'gemini', 'off'];

function parseFixProvider(raw: string | undefined): FixProviderRaw {
  const found = VALID_PROVIDERS.find((p) => p === raw);
  return found ?? 'auto';
}

function defaultCustomRulesPath(): string {
  return path.join(os.homedir(), '.config', 'diffwarden', 'rules.yml');
}

export const env = {
  githubToken: process.env.GITHUB_TOKEN ?? '',
  githubOwner: process.env.GITHUB_OWNER ?? '',
  githubRepo: process.env.GITHUB_REPO ?? '',
  port: Number(process.env.PORT ?? 3000),
  nodeEnv: process.env.NODE_ENV ?? 'development',
  geminiApiKey: process.env.GEMINI_API_KEY ?? '',
  fixProviderRaw: parseFixProvider(process.env.FIX_PROVIDER),
  customRulesPath: process.env.DIFFWARDEN_RULES_PATH || defaultCustomRulesPath(),
} as const;

export function getFixProviderConfig(): FixProviderConfig {
  const geminiConfigured = Boolean(env.geminiApiKey);
  let configured: FixProviderType;

  if (env.fixProviderRaw === 'auto') {
    configured = geminiConfigured ? 'gemini' : 'off';
  } else {
    configured = env.fixProviderRaw;
  }

  const effective = (configured === 'gemini' && !geminiConfigured)
    ? 'off'
    : configured;

  return { configured, effective, geminiConfigured };
}

export function validateConfig(): void {
  if (env.fixProviderRaw !== 'gemini' || env.geminiApiKey) {
    return;
  }

  if (env.nodeEnv === 'production') {
    throw new Error(
      'GEMINI_API_KEY is required when FIX_PROVIDER=gemini in production'
    );
  }
  console.warn(
    '[config] WARNING: FIX_PROVIDER=gemini but GEMINI_API_KEY is not set. Fix proposals are disabled.'
  );
}

export { PROJECT_ROOT };
