/**
 * Embedded Templates Index
 * Re-exports every renderer and static template body used by the catalog
 */

export { renderRequirements, renderDevRequirements } from './requirements.js';
export { renderSettingsModule, pythonString, SECURITY_MODULE, LOGGER_MODULE } from './core.js';
export {
  DATABASE_BASE_MODULE,
  DATABASE_SESSION_MODULE,
  ALEMBIC_INI,
  ALEMBIC_ENV,
  ALEMBIC_SCRIPT_TEMPLATE
} from './database.js';
export { renderApiDependencies, renderMainModule, renderApiRouter, HEALTH_ENDPOINT } from './api.js';
export { renderWorkerModule, EXAMPLE_TASK_MODULE, TASKS_ENDPOINT } from './worker.js';
export { buildEnvironment, renderEnvFile } from './env.js';
export type { EnvSection } from './env.js';
export { renderDockerfile, renderCompose, DOCKERIGNORE } from './docker.js';
export { renderGitignore } from './gitignore.js';
export { renderConftest, HEALTH_TEST, PYTEST_INI } from './testing.js';
export { renderMakefile, renderCiWorkflow, PRECOMMIT_CONFIG } from './tooling.js';
export { renderReadme } from './readme.js';
