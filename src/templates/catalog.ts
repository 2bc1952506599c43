/**
 * Artifact Catalog - the static, ordered list of everything a generated
 * project can contain, each entry gated by a predicate over the config.
 *
 * Ordering rules: a directory comes before anything inside it, and the
 * dependency lists come before files that tell you to install them.
 */

import { posix } from 'path';
import type { ArtifactDescriptor, ArtifactPredicate, ArtifactRenderer, ProjectConfig, ResolvedArtifact } from '../types.js';
import {
  always,
  whenBackgroundTasks,
  whenContainerized,
  whenDatabase
} from './fragments.js';
import * as tpl from './embedded/index.js';

function directory(relativePath: string, predicate: ArtifactPredicate = always): ArtifactDescriptor {
  return Object.freeze({ kind: 'directory', relativePath, predicate });
}

function file(relativePath: string, render: ArtifactRenderer | string, predicate: ArtifactPredicate = always): ArtifactDescriptor {
  const renderer: ArtifactRenderer = typeof render === 'string' ? () => render : render;
  return Object.freeze({ kind: 'file', relativePath, predicate, render: renderer });
}

function placeholder(relativePath: string, predicate: ArtifactPredicate = always): ArtifactDescriptor {
  return Object.freeze({ kind: 'file', relativePath, predicate });
}

const packageMarker = (dir: string, predicate: ArtifactPredicate = always) =>
  placeholder(`${dir}/__init__.py`, predicate);

/**
 * Build the full catalog. Every call returns a new frozen list with the same
 * entries in the same order.
 */
export function buildCatalog(): readonly ArtifactDescriptor[] {
  return Object.freeze([
    // Directory tree
    directory('app'),
    directory('app/api'),
    directory('app/api/v1'),
    directory('app/api/v1/endpoints'),
    directory('app/core'),
    directory('app/db', whenDatabase),
    directory('app/db/models', whenDatabase),
    directory('app/schemas'),
    directory('app/services'),
    directory('app/utils'),
    directory('app/middleware'),
    directory('app/tasks', whenBackgroundTasks),
    directory('tests'),
    directory('tests/api'),
    directory('tests/services'),
    directory('alembic', whenDatabase),
    directory('alembic/versions', whenDatabase),
    directory('scripts'),
    directory('docs'),
    directory('.github'),
    directory('.github/workflows'),
    directory('logs'),

    // Dependencies
    file('requirements.txt', tpl.renderRequirements),
    file('requirements-dev.txt', tpl.renderDevRequirements),

    // Core
    file('app/core/config.py', tpl.renderSettingsModule),
    packageMarker('app'),
    packageMarker('app/core'),
    packageMarker('app/api'),
    packageMarker('app/api/v1'),
    packageMarker('app/api/v1/endpoints'),
    packageMarker('app/db', whenDatabase),
    packageMarker('app/db/models', whenDatabase),
    packageMarker('app/schemas'),
    packageMarker('app/services'),
    packageMarker('app/utils'),
    packageMarker('app/middleware'),
    file('app/core/security.py', tpl.SECURITY_MODULE),
    file('app/core/logger.py', tpl.LOGGER_MODULE),
    placeholder('logs/.gitkeep'),

    // Database session
    file('app/db/base.py', tpl.DATABASE_BASE_MODULE, whenDatabase),
    file('app/db/session.py', tpl.DATABASE_SESSION_MODULE, whenDatabase),

    // API
    file('app/api/deps.py', tpl.renderApiDependencies),
    file('app/main.py', tpl.renderMainModule),
    file('app/api/v1/api.py', tpl.renderApiRouter),
    file('app/api/v1/endpoints/health.py', tpl.HEALTH_ENDPOINT),
    file('app/api/v1/endpoints/tasks.py', tpl.TASKS_ENDPOINT, whenBackgroundTasks),

    // Background tasks
    file('app/worker.py', tpl.renderWorkerModule, whenBackgroundTasks),
    packageMarker('app/tasks', whenBackgroundTasks),
    file('app/tasks/example.py', tpl.EXAMPLE_TASK_MODULE, whenBackgroundTasks),

    // Environment: both files share one renderer
    file('.env.example', tpl.renderEnvFile),
    file('.env', tpl.renderEnvFile),

    // Containers
    file('Dockerfile', tpl.renderDockerfile, whenContainerized),
    file('docker-compose.yml', tpl.renderCompose, whenContainerized),
    file('.dockerignore', tpl.DOCKERIGNORE, whenContainerized),

    file('.gitignore', tpl.renderGitignore),

    // Migrations
    file('alembic.ini', tpl.ALEMBIC_INI, whenDatabase),
    file('alembic/env.py', tpl.ALEMBIC_ENV, whenDatabase),
    file('alembic/script.py.mako', tpl.ALEMBIC_SCRIPT_TEMPLATE, whenDatabase),
    placeholder('alembic/versions/.gitkeep', whenDatabase),

    // Tests
    file('tests/conftest.py', tpl.renderConftest),
    file('tests/test_health.py', tpl.HEALTH_TEST),
    file('pytest.ini', tpl.PYTEST_INI),
    packageMarker('tests'),
    packageMarker('tests/api'),
    packageMarker('tests/services'),

    // Tooling and docs
    file('.pre-commit-config.yaml', tpl.PRECOMMIT_CONFIG),
    file('.github/workflows/ci.yml', tpl.renderCiWorkflow),
    file('README.md', tpl.renderReadme),
    file('Makefile', tpl.renderMakefile)
  ]);
}

export const CATALOG: readonly ArtifactDescriptor[] = buildCatalog();

/**
 * Check the structural rules of a catalog: unique paths, relative POSIX
 * paths only, and every entry's parent directory declared before it.
 * @throws Error describing the first violation
 */
export function validateCatalog(catalog: readonly ArtifactDescriptor[]): void {
  const seen = new Set<string>();
  const directories = new Set<string>();

  for (const descriptor of catalog) {
    const { relativePath } = descriptor;

    if (relativePath.length === 0 || posix.isAbsolute(relativePath) || posix.normalize(relativePath) !== relativePath || relativePath.startsWith('..')) {
      throw new Error(`Catalog path must be a normalized relative path: '${relativePath}'`);
    }

    if (seen.has(relativePath)) {
      throw new Error(`Catalog path declared twice: '${relativePath}'`);
    }
    seen.add(relativePath);

    const parent = posix.dirname(relativePath);
    if (parent !== '.' && !directories.has(parent)) {
      throw new Error(`'${relativePath}' appears before its directory '${parent}'`);
    }

    if (descriptor.kind === 'directory') {
      if (descriptor.render) {
        throw new Error(`Directory '${relativePath}' cannot have a renderer`);
      }
      directories.add(relativePath);
    }
  }
}

/**
 * Select the artifacts whose predicate holds and render each one once.
 * Placeholders resolve to empty content.
 */
export function resolveCatalog(
  config: ProjectConfig,
  catalog: readonly ArtifactDescriptor[] = CATALOG
): ResolvedArtifact[] {
  const resolved: ResolvedArtifact[] = [];

  for (const descriptor of catalog) {
    if (!descriptor.predicate(config)) {
      continue;
    }

    if (descriptor.kind === 'directory') {
      resolved.push({ kind: 'directory', relativePath: descriptor.relativePath });
    } else {
      resolved.push({
        kind: 'file',
        relativePath: descriptor.relativePath,
        content: descriptor.render ? descriptor.render(config) : ''
      });
    }
  }

  return resolved;
}
