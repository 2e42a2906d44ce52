#!/usr/bin/env node
import type { AntiPattern, Language } from '../types.js';
import { LANGUAGES, SEVERITIES } from '../types.js';
import { buildRegistry } from '../engine/pattern-registry.js';
import { CUSTOM_RULE_PREFIX, CustomRulesManager, loadProjectRulesSafely } from '../engine/custom-rules.js';
import { detectProject } from '../engine/project-detector.js';
import type { RulesCommand } from './args.js';
import { UsageError, parseRulesArgs } from './args.js';

const USAGE = `Usage: diffwarden-rules <command>

  list [--language <lang>]     rules grouped by language
  search <query>               match id, name or description
  show <id>                    full detail for one rule
  add --language <lang> --id <id> --pattern <regex> --fix <text> --description <text> [--severity <level>]
                               add a custom rule to the current project
  remove <id>                  remove a custom rule from the current project`;

function ruleLine(rule: AntiPattern): string {
  const flags = rule.enabled ? '' : ' [disabled]';
  return `    [${rule.severity}] ${rule.name} (${rule.id})${flags}`;
}

function printGrouped(rules: AntiPattern[]) {
  const languages: readonly Language[] = LANGUAGES;
  for (const language of languages) {
    const group = rules.filter((r) => r.language === language);
    if (group.length === 0) continue;

    console.log(`${language} (${group.length} rules)`);
    for (const severity of SEVERITIES) {
      const count = group.filter((r) => r.severity === severity).length;
      if (count > 0) console.log(`  ${severity}: ${count}`);
    }
    for (const rule of group) {
      console.log(ruleLine(rule));
    }
    console.log('');
  }
  console.log(`Total: ${rules.length} rules`);
}

function printDetail(rule: AntiPattern) {
  console.log(`Rule: ${rule.name}`);
  console.log(`ID: ${rule.id}`);
  console.log(`Language: ${rule.language}`);
  console.log(`Severity: ${rule.severity}`);
  console.log(`Detection: ${rule.detectionMethod.type} ${rule.detectionMethod.pattern}`);
  console.log(`Description: ${rule.description}`);
  console.log(`Fix: ${rule.fixSuggestion}`);
  if (rule.sourceUrl) console.log(`Source: ${rule.sourceUrl}`);
  console.log(`Auto-fixable: ${rule.claudeCodeFixable ? 'yes' : 'no'}`);
  if (rule.tags.length > 0) console.log(`Tags: ${rule.tags.join(', ')}`);

  if (rule.examples.length > 0) {
    console.log('\nExamples:');
    for (const example of rule.examples) {
      console.log(`  Bad:  ${example.bad}`);
      console.log(`  Good: ${example.good}`);
      console.log(`  Why:  ${example.explanation}`);
    }
  }
}

function run(command: RulesCommand) {
  if (command.kind === 'help') {
    console.log(USAGE);
    return;
  }

  const project = detectProject();
  const manager = new CustomRulesManager();

  if (command.kind === 'add') {
    manager.addProjectRule(project.name, project.rootPath, command.language, {
      id: command.id,
      description: command.description,
      pattern: command.pattern,
      severity: command.severity,
      fix: command.fix,
      enabled: true,
    });
    console.log(`Added custom rule ${CUSTOM_RULE_PREFIX}${command.id} to project ${project.name}`);
    console.log(`Saved to: ${manager.configPath}`);
    return;
  }

  if (command.kind === 'remove') {
    const id = command.id.startsWith(CUSTOM_RULE_PREFIX) ? command.id.slice(CUSTOM_RULE_PREFIX.length) : command.id;
    if (manager.removeProjectRule(project.name, id)) {
      console.log(`Removed custom rule ${id} from project ${project.name}`);
    } else {
      console.log(`No custom rule "${id}" in project ${project.name}`);
      process.exitCode = 1;
    }
    return;
  }

  const registry = buildRegistry({ customRules: loadProjectRulesSafely(manager, project.name) });

  switch (command.kind) {
    case 'list': {
      const rules = command.language ? registry.getPatternsForLanguage(command.language) : registry.listPatterns();
      printGrouped(rules);
      break;
    }
    case 'search': {
      const found = registry.searchPatterns(command.query);
      if (found.length === 0) {
        console.log(`No rules match "${command.query}"`);
        break;
      }
      printGrouped(found);
      break;
    }
    case 'show': {
      const rule = registry.getPattern(command.id);
      if (!rule) {
        console.log(`Rule '${command.id}' not found`);
        process.exitCode = 1;
        break;
      }
      printDetail(rule);
      break;
    }
  }
}

try {
  run(parseRulesArgs(process.argv.slice(2)));
} catch (err) {
  const message = err instanceof Error ? err.message : String(err);
  console.error('Error:', message);
  if (err instanceof UsageError) {
    console.error(`\n${USAGE}`);
  }
  process.exit(1);
}
