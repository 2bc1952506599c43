/**
 * Project configuration model
 * Turns raw command-line input into the frozen ProjectConfig every renderer reads.
 */

import { randomBytes } from 'crypto';
import { join } from 'path';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import {
  DEFAULT_AUTHOR,
  DEFAULT_DESCRIPTION,
  DEFAULT_EMAIL,
  DEFAULT_FEATURES,
  SECRET_BYTES
} from '../constants.js';
import type { FeatureToggles, ProjectConfig, RawProjectArgs, ScaffoldDefaults } from '../types.js';
import process from "node:process";

const rawArgsSchema = z.object({
  name: z.string().optional(),
  author: z.string().optional(),
  email: z.string().optional(),
  description: z.string().optional(),
  postgres: z.boolean().optional(),
  redis: z.boolean().optional(),
  docker: z.boolean().optional(),
  celery: z.boolean().optional()
});

export type FeatureFlags = Pick<RawProjectArgs, 'postgres' | 'redis' | 'docker' | 'celery'>;

export interface ResolveOptions {
  /** Directory the project folder is created in (default: process.cwd()) */
  cwd?: string;
  /** Values from defaults.toml, applied below explicit flags */
  defaults?: ScaffoldDefaults;
  /** Secret source; called exactly once per resolution */
  generateSecret?: () => string;
}

/**
 * Lower-case the name, then replace every space and every underscore with a hyphen.
 * Nothing else is touched, punctuation included.
 */
export function deriveSlug(name: string): string {
  return name.toLowerCase().replace(/ /g, '-').replace(/_/g, '-');
}

/**
 * Reason the name cannot become a folder under the working directory, if any.
 */
export function directoryNameProblem(name: string): string | undefined {
  if (/[\\/]/.test(name)) {
    return 'Project name cannot contain path separators';
  }
  const slug = deriveSlug(name);
  if (slug === '.' || slug === '..') {
    return `"${name}" cannot be used as a directory name`;
  }
  return undefined;
}

export function generateSecret(): string {
  return randomBytes(SECRET_BYTES).toString('hex');
}

/**
 * Map command-line flags onto toggles. An unset flag takes the built-in
 * policy: everything on except background tasks.
 */
export function resolveFeatureToggles(flags: FeatureFlags): FeatureToggles {
  return Object.freeze({
    database: flags.postgres ?? DEFAULT_FEATURES.database,
    cache: flags.redis ?? DEFAULT_FEATURES.cache,
    containerize: flags.docker ?? DEFAULT_FEATURES.containerize,
    backgroundTasks: flags.celery ?? DEFAULT_FEATURES.backgroundTasks
  });
}

/**
 * Resolve raw input into a ProjectConfig.
 * @throws ConfigError when the name is blank or would leave the working
 * directory, or when a field has the wrong type
 */
export function resolveProjectConfig(raw: RawProjectArgs, options: ResolveOptions = {}): ProjectConfig {
  const parsed = rawArgsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? String(issue.path[0] ?? 'input') : 'input';
    throw new ConfigError('InvalidField', field, `Invalid value for ${field}: ${issue?.message ?? 'unknown error'}`);
  }

  const args = parsed.data;
  const name = args.name ?? '';
  if (name.trim().length === 0) {
    throw new ConfigError('EmptyName', 'name');
  }
  const problem = directoryNameProblem(name);
  if (problem !== undefined) {
    throw new ConfigError('InvalidField', 'name', problem);
  }

  const defaults = options.defaults ?? {};
  const slug = deriveSlug(name);
  const secret = (options.generateSecret ?? generateSecret)();

  return Object.freeze({
    name,
    slug,
    author: args.author ?? defaults.author ?? DEFAULT_AUTHOR,
    email: args.email ?? defaults.email ?? DEFAULT_EMAIL,
    description: args.description ?? defaults.description ?? DEFAULT_DESCRIPTION,
    features: resolveFeatureToggles(args),
    secret,
    rootPath: join(options.cwd ?? process.cwd(), slug)
  });
}
