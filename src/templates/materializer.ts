/**
 * Tree Materializer - writes resolved artifacts beneath the project root
 */

import { join } from 'path';
import type { IFileSystemManager } from '../interfaces.js';
import type { MaterializeResult, ResolvedArtifact } from '../types.js';

/**
 * Create the root directory and then every artifact, in catalog order.
 * Existing directories are reused and existing files are overwritten, so
 * running twice over the same root converges on the same tree.
 *
 * The first failing write propagates as a FileSystemError; nothing written
 * before it is rolled back.
 */
export function materialize(
  rootPath: string,
  artifacts: readonly ResolvedArtifact[],
  fileSystem: IFileSystemManager,
  onProgress?: (message: string) => void
): MaterializeResult {
  const result: MaterializeResult = { rootPath, directories: [], files: [] };

  onProgress?.(`Creating ${rootPath}...`);
  fileSystem.createDirectory(rootPath, true);

  for (const artifact of artifacts) {
    const target = join(rootPath, ...artifact.relativePath.split('/'));

    if (artifact.kind === 'directory') {
      fileSystem.createDirectory(target, true);
      result.directories.push(artifact.relativePath);
    } else {
      onProgress?.(`Writing ${artifact.relativePath}`);
      fileSystem.writeFile(target, artifact.content);
      result.files.push(artifact.relativePath);
    }
  }

  return result;
}
