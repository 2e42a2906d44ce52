import { serve } from '@hono/node-server';
import { createApp } from './app.js';
import { env, validateConfig } from './config.js';
import { buildRegistry } from './engine/pattern-registry.js';
import { CustomRulesManager, loadProjectRulesSafely } from './engine/custom-rules.js';
import { detectProject } from './engine/project-detector.js';

validateConfig();

const project = detectProject();
const registry = buildRegistry({
  customRules: loadProjectRulesSafely(new CustomRulesManager(), project.name),
});
const app = createApp({ registry });

serve({
  fetch: app.fetch,
  port: env.port,
}, (info) => {
  console.log(`diffwarden review API running on http://localhost:${info.port}`);
  console.log(`Environment: ${env.nodeEnv}`);
  console.log(`Project: ${project.name} (${registry.size} rules loaded)`);
  console.log('');
  console.log('Endpoints:');
  console.log('  GET  /health');
  console.log('  POST /api/review/run');
  console.log('  GET  /api/rules');
  console.log('  GET  /api/rules/:id');
});
