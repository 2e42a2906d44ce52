import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { AntiPattern, Language, Severity } from '../types.js';
import { isLanguage, isSeverity } from '../types.js';
import { env } from '../config.js';
import { RuleSetError } from './rule-loader.js';

export const CUSTOM_RULE_PREFIX = 'custom_';
const CUSTOM_RULE_SOURCE = 'Custom project rule';

export interface CustomRule {
  id: string;
  description: string;
  pattern: string;
  severity: string;
  fix: string;
  enabled: boolean;
}

export interface ProjectRules {
  path: string;
  gitRoot: boolean;
  rules: Record<string, CustomRule[]>;
}

export interface CustomRulesConfig {
  projects: Record<string, ProjectRules>;
}

// On-disk shape
interface RawCustomRule {
  id?: unknown;
  description?: unknown;
  pattern?: unknown;
  severity?: unknown;
  fix?: unknown;
  enabled?: unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function text(value: unknown, field: string, where: string): string {
  if (typeof value !== 'string') {
    throw new RuleSetError(`${where}: "${field}" must be a string`);
  }
  return value;
}

function parseCustomRule(raw: RawCustomRule, where: string): CustomRule {
  return {
    id: text(raw.id, 'id', where),
    description: text(raw.description, 'description', where),
    pattern: text(raw.pattern, 'pattern', where),
    severity: text(raw.severity, 'severity', where),
    fix: text(raw.fix, 'fix', where),
    enabled: raw.enabled !== false,
  };
}

function parseProject(name: string, raw: Record<string, unknown>): ProjectRules {
  const rawRules = raw.rules ?? {};
  if (!isRecord(rawRules)) {
    throw new RuleSetError(`Project ${name}: "rules" must be a mapping`);
  }
  const rules: Record<string, CustomRule[]> = {};
  for (const [language, list] of Object.entries(rawRules)) {
    if (!Array.isArray(list)) {
      throw new RuleSetError(`Project ${name}: rules for "${language}" must be a list`);
    }
    rules[language] = list.map((entry: unknown, i) => {
      if (!isRecord(entry)) {
        throw new RuleSetError(`Project ${name}: ${language} rule #${i + 1} must be a mapping`);
      }
      return parseCustomRule(entry, `Project ${name}: ${language} rule #${i + 1}`);
    });
  }
  return {
    path: typeof raw.path === 'string' ? raw.path : '',
    gitRoot: raw.git_root !== false,
    rules,
  };
}

export function parseCustomRulesConfig(yamlText: string): CustomRulesConfig {
  const doc: unknown = parseYaml(yamlText);
  if (doc === null || doc === undefined) {
    return { projects: {} };
  }
  if (!isRecord(doc)) {
    throw new RuleSetError('Custom rules file must be a mapping');
  }
  const projects: Record<string, ProjectRules> = {};
  const rawProjects = doc.projects ?? {};
  if (!isRecord(rawProjects)) {
    throw new RuleSetError('"projects" must be a mapping');
  }
  for (const [name, raw] of Object.entries(rawProjects)) {
    if (!isRecord(raw)) {
      throw new RuleSetError(`Project ${name} must be a mapping`);
    }
    projects[name] = parseProject(name, raw);
  }
  return { projects };
}

function serializeConfig(config: CustomRulesConfig): string {
  const projects: Record<string, unknown> = {};
  for (const [name, project] of Object.entries(config.projects)) {
    projects[name] = {
      path: project.path,
      git_root: project.gitRoot,
      rules: project.rules,
    };
  }
  return stringifyYaml({ projects });
}

/**
 * Convert one stored rule into a registry entry. Unknown severities become warnings.
 */
export function toAntiPattern(rule: CustomRule, language: Language): AntiPattern {
  const severity: Severity = isSeverity(rule.severity) ? rule.severity : 'warning';
  return {
    id: `${CUSTOM_RULE_PREFIX}${rule.id}`,
    name: rule.description,
    language,
    severity,
    description: rule.description,
    detectionMethod: { type: 'regex', pattern: rule.pattern },
    fixSuggestion: rule.fix,
    sourceUrl: CUSTOM_RULE_SOURCE,
    claudeCodeFixable: false,
    examples: [],
    tags: ['custom'],
    enabled: true,
  };
}

/**
 * Per-project rules kept in a YAML file (default `~/.config/diffwarden/rules.yml`).
 * Every mutation reads the file, applies the change and writes it back.
 */
export class CustomRulesManager {
  constructor(readonly configPath: string = env.customRulesPath) {}

  loadConfig(): CustomRulesConfig {
    if (!existsSync(this.configPath)) {
      return { projects: {} };
    }
    return parseCustomRulesConfig(readFileSync(this.configPath, 'utf-8'));
  }

  saveConfig(config: CustomRulesConfig): void {
    mkdirSync(path.dirname(this.configPath), { recursive: true });
    writeFileSync(this.configPath, serializeConfig(config), 'utf-8');
  }

  addProjectRule(projectName: string, projectPath: string, language: Language, rule: CustomRule): void {
    const config = this.loadConfig();
    const project = config.projects[projectName] ?? { path: projectPath, gitRoot: true, rules: {} };
    config.projects[projectName] = project;
    (project.rules[language] ??= []).push(rule);
    this.saveConfig(config);
  }

  getProjectRules(projectName: string): AntiPattern[] {
    const project = this.loadConfig().projects[projectName];
    if (!project) {
      return [];
    }

    const patterns: AntiPattern[] = [];
    for (const [language, rules] of Object.entries(project.rules)) {
      if (!isLanguage(language)) {
        console.warn(`[custom-rules] Ignoring rules for unknown language "${language}" in project ${projectName}`);
        continue;
      }
      for (const rule of rules) {
        if (rule.enabled) {
          patterns.push(toAntiPattern(rule, language));
        }
      }
    }
    return patterns;
  }

  /**
   * Remove a rule by its stored id (without the `custom_` prefix) from every language.
   */
  removeProjectRule(projectName: string, ruleId: string): boolean {
    const config = this.loadConfig();
    const project = config.projects[projectName];
    if (!project) {
      return false;
    }

    let found = false;
    for (const [language, rules] of Object.entries(project.rules)) {
      const kept = rules.filter((rule) => rule.id !== ruleId);
      if (kept.length !== rules.length) {
        found = true;
        project.rules[language] = kept;
      }
    }

    if (found) {
      this.saveConfig(config);
    }
    return found;
  }
}

/**
 * Custom rules for a project, or none when the store cannot be read.
 */
export function loadProjectRulesSafely(manager: CustomRulesManager, projectName: string): AntiPattern[] {
  try {
    return manager.getProjectRules(projectName);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    console.warn(`[custom-rules] Failed to load custom rules from ${manager.configPath}: ${reason}`);
    return [];
  }
}
