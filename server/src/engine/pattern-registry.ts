import type { AntiPattern, Language } from '../types.js';
import { fileExtension, matchesFileExtension } from './languages.js';
import { parseRuleSet, readBuiltinRuleSources } from './rule-loader.js';
import type { SkippedRule } from './rule-loader.js';

/**
 * In-memory rule store, indexed by id and by language.
 *
 * Built once (load, add custom rules, compile, freeze) and read-only afterwards;
 * a frozen registry can be shared by any number of review engines.
 */
export class PatternRegistry {
  private readonly patterns = new Map<string, AntiPattern>();
  private readonly byLanguage = new Map<Language, string[]>();
  private readonly compiledPatterns = new Map<string, RegExp>();
  private frozen = false;

  get size(): number {
    return this.patterns.size;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /**
   * Upsert by id. The language index is append-only, so re-adding an id lists it twice there.
   */
  addPattern(pattern: AntiPattern): void {
    this.assertWritable();
    this.patterns.set(pattern.id, pattern);
    const ids = this.byLanguage.get(pattern.language);
    if (ids) {
      ids.push(pattern.id);
    } else {
      this.byLanguage.set(pattern.language, [pattern.id]);
    }
  }

  loadRulesFromSource(text: string, expectedLanguage: Language, source?: string): SkippedRule[] {
    this.assertWritable();
    const { rules, skipped } = parseRuleSet(text, expectedLanguage, source);
    for (const rule of rules) {
      this.addPattern(rule);
    }
    for (const skip of skipped) {
      console.warn(`[registry] Skipping rule ${skip.id}: ${skip.reason}`);
    }
    return skipped;
  }

  loadAllEmbeddedRules(): void {
    for (const { language, text, source } of readBuiltinRuleSources()) {
      this.loadRulesFromSource(text, language, source);
    }
  }

  loadBuiltInPatterns(): void {
    this.loadAllEmbeddedRules();
    this.compileAllPatterns();
  }

  loadCustomRules(rules: AntiPattern[]): void {
    for (const rule of rules) {
      this.addPattern(rule);
    }
  }

  /**
   * Compile every regex rule once. A pattern that fails to compile is left out of the
   * compiled map and never matches.
   */
  compileAllPatterns(): void {
    this.assertWritable();
    this.compiledPatterns.clear();
    for (const pattern of this.patterns.values()) {
      if (pattern.detectionMethod.type !== 'regex') continue;
      try {
        this.compiledPatterns.set(pattern.id, new RegExp(pattern.detectionMethod.pattern));
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        console.warn(`[registry] Failed to compile regex for pattern ${pattern.id}: ${reason}`);
      }
    }
  }

  getCompiledPattern(id: string): RegExp | undefined {
    return this.compiledPatterns.get(id);
  }

  get compiledCount(): number {
    return this.compiledPatterns.size;
  }

  getPattern(id: string): AntiPattern | undefined {
    return this.patterns.get(id);
  }

  getPatternsForLanguage(language: Language): AntiPattern[] {
    const ids = this.byLanguage.get(language) ?? [];
    const result: AntiPattern[] = [];
    for (const id of ids) {
      const pattern = this.patterns.get(id);
      if (pattern) result.push(pattern);
    }
    return result;
  }

  /**
   * Enabled rules of every language whose extension set contains the file's extension.
   */
  getPatternsForFile(filePath: string): AntiPattern[] {
    const extension = fileExtension(filePath);
    return this.listPatterns().filter(
      (p) => p.enabled && matchesFileExtension(p.language, extension),
    );
  }

  searchPatterns(query: string): AntiPattern[] {
    const needle = query.toLowerCase();
    return this.listPatterns().filter(
      (p) =>
        p.name.toLowerCase().includes(needle)
        || p.description.toLowerCase().includes(needle)
        || p.id.toLowerCase().includes(needle),
    );
  }

  listPatterns(): AntiPattern[] {
    return [...this.patterns.values()];
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  private assertWritable(): void {
    if (this.frozen) {
      throw new Error('PatternRegistry is frozen; build a new registry to change rules');
    }
  }
}

export interface BuildRegistryOptions {
  builtIn?: boolean;
  customRules?: AntiPattern[];
}

/**
 * One-time initializer: built-in rules, then custom rules, compiled and frozen.
 */
export function buildRegistry(opts: BuildRegistryOptions = {}): PatternRegistry {
  const registry = new PatternRegistry();
  if (opts.builtIn ?? true) {
    registry.loadAllEmbeddedRules();
  }
  registry.loadCustomRules(opts.customRules ?? []);
  registry.compileAllPatterns();
  return registry.freeze();
}
