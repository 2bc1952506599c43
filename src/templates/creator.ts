/**
 * Project Creator - resolves the catalog for a configuration, writes the tree
 * and takes the initial version-control snapshot
 */

import type { IFileSystemManager, IProjectCreator, IVersionControl } from '../interfaces.js';
import type { ArtifactDescriptor, GenerationOptions, GenerationResult, ProjectConfig } from '../types.js';
import { CATALOG, resolveCatalog, validateCatalog } from './catalog.js';
import { materialize } from './materializer.js';

export class ProjectCreator implements IProjectCreator {
  constructor(
    private fileSystemManager: IFileSystemManager,
    private versionControl: IVersionControl,
    private catalog: readonly ArtifactDescriptor[] = CATALOG
  ) {
    validateCatalog(catalog);
  }

  /**
   * Generate the project described by `config` under `config.rootPath`.
   *
   * Every artifact is rendered before the first write. File system failures
   * propagate; a failed snapshot only adds a warning to the result.
   */
  public async generate(
    config: ProjectConfig,
    options: GenerationOptions = {}
  ): Promise<GenerationResult> {
    const { onProgress } = options;

    onProgress?.('Rendering templates...');
    const artifacts = resolveCatalog(config, this.catalog);

    const written = materialize(config.rootPath, artifacts, this.fileSystemManager, onProgress);

    if (options.git === false) {
      return { ...written, snapshot: 'skipped', warnings: [] };
    }

    onProgress?.('Initializing git repository...');
    const snapshot = await this.versionControl.snapshot(config.rootPath, onProgress);

    return {
      ...written,
      snapshot: snapshot.success ? 'created' : 'failed',
      warnings: snapshot.warning ? [snapshot.warning] : []
    };
  }
}
