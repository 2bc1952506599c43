/**
 * Shared predicates and text-composition helpers.
 *
 * The catalog gates artifacts with these predicates and the renderers branch on
 * the very same functions, so a toggle has one meaning everywhere.
 */

import type { ArtifactPredicate, ProjectConfig } from '../types.js';

// Predicates

export const always: ArtifactPredicate = () => true;

export const whenDatabase: ArtifactPredicate = (config) => config.features.database;

export const whenCache: ArtifactPredicate = (config) => config.features.cache;

export const whenContainerized: ArtifactPredicate = (config) => config.features.containerize;

export const whenBackgroundTasks: ArtifactPredicate = (config) => config.features.backgroundTasks;

// Composition

export type Fragment = string | false | null | undefined;

/**
 * Returns `text` when `condition` holds, otherwise an empty fragment.
 * A function is only evaluated when needed.
 */
export function when(condition: boolean, text: string | (() => string)): Fragment {
  if (!condition) {
    return false;
  }
  return typeof text === 'function' ? text() : text;
}

/**
 * Join fragments line by line, dropping the ones that were switched off.
 */
export function lines(...fragments: Fragment[]): string {
  return fragments.filter((fragment): fragment is string => typeof fragment === 'string').join('\n');
}

/**
 * Join blocks with one blank line between them. Empty blocks disappear
 * and each block's surrounding blank lines are trimmed, so the output
 * never has doubled separators.
 */
export function blocks(...fragments: Fragment[]): string {
  return fragments
    .filter((fragment): fragment is string => typeof fragment === 'string')
    .map(fragment => fragment.replace(/^\n+|\n+$/g, ''))
    .filter(fragment => fragment.length > 0)
    .join('\n\n');
}

/**
 * A commented section: `# Title` followed by its lines.
 */
export function section(title: string, ...body: Fragment[]): string {
  return lines(`# ${title}`, ...body);
}

/**
 * Make sure generated text ends with exactly one newline.
 */
export function finalize(text: string): string {
  return text.replace(/\s+$/, '') + '\n';
}

/**
 * Indent every non-empty line by `spaces` spaces.
 */
export function indent(text: string, spaces: number): string {
  const pad = ' '.repeat(spaces);
  return text
    .split('\n')
    .map(line => (line.length > 0 ? pad + line : line))
    .join('\n');
}

// Values several artifacts must agree on

export const DATABASE_USER = 'user';
export const DATABASE_PASSWORD = 'password';

export function databaseName(config: ProjectConfig): string {
  return `${config.slug}_db`;
}

export function databaseUrl(config: ProjectConfig, host: string): string {
  return `postgresql://${DATABASE_USER}:${DATABASE_PASSWORD}@${host}:5432/${databaseName(config)}`;
}

export function redisUrl(host: string, database: number = 0): string {
  return `redis://${host}:6379/${database}`;
}

export function containerName(config: ProjectConfig, service: string): string {
  return `${config.slug}_${service}`;
}

export interface BrokerSettings {
  brokerUrl: string;
  resultBackend: string;
}

/**
 * Task-queue broker. Rides on the cache server when there is one and on a
 * dedicated RabbitMQ broker otherwise, so turning the cache off leaves no
 * trace of it in the worker setup.
 */
export function brokerSettings(config: ProjectConfig, host: string): BrokerSettings {
  if (whenCache(config)) {
    return {
      brokerUrl: redisUrl(host, 1),
      resultBackend: redisUrl(host, 2)
    };
  }
  return {
    brokerUrl: `amqp://guest:guest@${host}:5672//`,
    resultBackend: 'rpc://'
  };
}

export const CORS_ORIGINS = ['http://localhost:3000', 'http://localhost:8000'] as const;
