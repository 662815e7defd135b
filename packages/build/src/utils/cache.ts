/**
 * Cache of finished frameworks, keyed by target, version and distribution mode
 */

import { join } from 'path';
import {
  CachedArtifact,
  DistributionMode,
  BuildError,
  BuildErrorCode,
  BuildPhase,
  errorMessage,
  asError
} from '../types.js';
import { DISTRIBUTION_MODES, TOOLCHAIN, realFrameworkName } from '../config.js';
import { directoryExists, ensureDirectory, moveItem, pathExists, removeIfExists } from './fs.js';
import { createLogger } from './logger.js';

const logger = createLogger('cache');

/** Cache configuration */
export interface CacheConfig {
  /** Base cache directory */
  baseDir: string;
}

/**
 * On-disk artifact cache laid out as
 * `<baseDir>/<mode dir>/<target>/<version>/<realName>.xcframework`.
 *
 * Entries are replaced whole, never modified in place. There is no locking:
 * concurrent builds of the same target and version must be serialized by
 * the caller.
 */
export class ArtifactCache {
  private readonly config: CacheConfig;

  constructor(config: CacheConfig) {
    this.config = { ...config };
  }

  get baseDir(): string {
    return this.config.baseDir;
  }

  /**
   * Directory holding an entry
   */
  entryDir(targetName: string, version: string, mode: DistributionMode = DistributionMode.Zip): string {
    return join(this.config.baseDir, DISTRIBUTION_MODES[mode].cacheDir, targetName, version);
  }

  /**
   * Path of an entry's container
   */
  entryPath(targetName: string, version: string, mode: DistributionMode = DistributionMode.Zip): string {
    return join(
      this.entryDir(targetName, version, mode),
      `${realFrameworkName(targetName)}.${TOOLCHAIN.CONTAINER_EXTENSION}`
    );
  }

  /**
   * Get a cached artifact if one exists
   */
  async lookup(
    targetName: string,
    version: string,
    mode: DistributionMode = DistributionMode.Zip
  ): Promise<CachedArtifact | null> {
    const path = this.entryPath(targetName, version, mode);

    if (!(await pathExists(path))) {
      logger.debug(`Cache miss for ${targetName} ${version} (${mode})`);
      return null;
    }

    logger.debug(`Cache hit for ${targetName} ${version} (${mode}): ${path}`);
    return { path, targetName, version, mode };
  }

  /**
   * Move a freshly built container into the cache, replacing any previous entry
   */
  async store(
    targetName: string,
    version: string,
    builtContainerPath: string,
    mode: DistributionMode = DistributionMode.Zip
  ): Promise<CachedArtifact> {
    const root = this.entryDir(targetName, version, mode);
    const path = this.entryPath(targetName, version, mode);

    try {
      // the move below requires an absent destination
      await removeIfExists(path);

      if (!(await directoryExists(root))) {
        await ensureDirectory(root);
      }

      await moveItem(builtContainerPath, path);
    } catch (error) {
      throw new BuildError(
        BuildErrorCode.CacheWriteFailed,
        `Could not move ${builtContainerPath} into the cache at ${path}: ${errorMessage(error)}`,
        BuildPhase.Cache,
        { targetName, path },
        false,
        asError(error)
      );
    }

    logger.info(`Cached ${targetName} ${version} at ${path}`);
    return { path, targetName, version, mode };
  }

  /**
   * Delete a cache entry
   */
  async remove(
    targetName: string,
    version: string,
    mode: DistributionMode = DistributionMode.Zip
  ): Promise<void> {
    const root = this.entryDir(targetName, version, mode);

    try {
      await removeIfExists(root);
    } catch (error) {
      throw new BuildError(
        BuildErrorCode.CacheWriteFailed,
        `Failed to delete cache entry ${root}: ${errorMessage(error)}`,
        BuildPhase.Cache,
        { targetName, path: root },
        false,
        asError(error)
      );
    }

    logger.debug(`Deleted cache entry: ${root}`);
  }

  /**
   * Clear all cache entries
   */
  async clear(): Promise<void> {
    try {
      await removeIfExists(this.config.baseDir);
      logger.info('Cache cleared');
    } catch (error) {
      throw new BuildError(
        BuildErrorCode.CacheWriteFailed,
        `Failed to clear cache: ${errorMessage(error)}`,
        BuildPhase.Cache,
        { path: this.config.baseDir },
        false,
        asError(error)
      );
    }
  }
}

/**
 * Create an artifact cache rooted at a directory
 */
export function createArtifactCache(baseDir: string): ArtifactCache {
  return new ArtifactCache({ baseDir });
}
