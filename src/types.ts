// Type definitions for the scaffolder

import type { VersionControlWarning } from './errors.js';

// Feature toggles
export type FeatureName = 'database' | 'cache' | 'containerize' | 'backgroundTasks';

export type FeatureToggles = Readonly<Record<FeatureName, boolean>>;

/**
 * Fully resolved generation input. Built once per run by
 * `resolveProjectConfig` and frozen; every renderer reads the same instance.
 */
export interface ProjectConfig {
  readonly name: string;
  /** Lower-cased name with spaces and underscores turned into hyphens */
  readonly slug: string;
  readonly author: string;
  readonly email: string;
  readonly description: string;
  readonly features: FeatureToggles;
  /** 64 hex characters, generated once per run */
  readonly secret: string;
  /** Output directory: working directory joined with the slug */
  readonly rootPath: string;
}

// Raw input as it arrives from the command line
export interface RawProjectArgs {
  name: string;
  author?: string;
  email?: string;
  description?: string;
  // Negated flags: `--no-postgres` sets `postgres: false`
  postgres?: boolean;
  redis?: boolean;
  docker?: boolean;
  celery?: boolean;
}

// Contents of defaults.toml
export interface ScaffoldDefaults {
  author?: string;
  email?: string;
  description?: string;
  git?: boolean;
}

// Catalog types
export type ArtifactKind = 'directory' | 'file';

export type ArtifactPredicate = (config: ProjectConfig) => boolean;

export type ArtifactRenderer = (config: ProjectConfig) => string;

export interface ArtifactDescriptor {
  readonly kind: ArtifactKind;
  /** POSIX-style path relative to the project root */
  readonly relativePath: string;
  readonly predicate: ArtifactPredicate;
  /** Omitted for directories and zero-byte placeholder files */
  readonly render?: ArtifactRenderer;
}

export type ResolvedArtifact =
  | { readonly kind: 'directory'; readonly relativePath: string }
  | { readonly kind: 'file'; readonly relativePath: string; readonly content: string };

// Generation types
export interface GenerationOptions {
  /** Create a git repository with an initial commit (default: true) */
  git?: boolean;
  onProgress?: (message: string) => void;
}

export interface MaterializeResult {
  rootPath: string;
  directories: string[];
  files: string[];
}

export interface SnapshotResult {
  success: boolean;
  warning?: VersionControlWarning;
}

export interface GenerationResult extends MaterializeResult {
  snapshot: 'created' | 'skipped' | 'failed';
  warnings: VersionControlWarning[];
}
