/**
 * Flattens CocoaPods-style public header trees.
 *
 * CocoaPods publishes headers as symbolic links under `Pods/Headers/`.
 * Copying that tree verbatim would ship links, so every header is resolved
 * to its real file and copied to the same relative location.
 */

import { dirname, extname, join, resolve, sep } from 'path';
import type { Stats } from 'fs';
import { copyFile, readdir, realpath, stat } from 'fs/promises';
import {
  HeaderMapping,
  BuildError,
  BuildErrorCode,
  BuildPhase,
  errorMessage,
  asError
} from './types.js';
import { DEFAULT_CONFIG } from './config.js';
import { ensureDirectory } from './utils/fs.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('headers');

export interface HeaderResolverOptions {
  /** Path fragment every header path must contain; relative paths start after it */
  anchor?: string;
  /** File extensions treated as headers */
  extensions?: string[];
}

export class HeaderResolver {
  private readonly anchor: string;
  private readonly extensions: ReadonlySet<string>;

  constructor(options: HeaderResolverOptions = {}) {
    this.anchor = options.anchor ?? DEFAULT_CONFIG.HEADERS_ANCHOR;
    this.extensions = new Set(options.extensions ?? ['.h']);
  }

  /**
   * Copy every header reachable from `sourceRoot` into `destinationRoot`,
   * keeping paths relative to `sourceRoot`
   */
  async flattenHeaders(sourceRoot: string, destinationRoot: string): Promise<HeaderMapping[]> {
    const mappings = await this.mapHeaders(sourceRoot);

    try {
      await ensureDirectory(destinationRoot);

      for (const { relativePath, resolvedLocation } of mappings) {
        const finalPath = join(destinationRoot, relativePath);
        await ensureDirectory(dirname(finalPath));
        await copyFile(resolvedLocation, finalPath);
      }
    } catch (error) {
      throw new BuildError(
        BuildErrorCode.FileSystemError,
        `Could not copy headers from ${sourceRoot} to ${destinationRoot}: ${errorMessage(error)}`,
        BuildPhase.Headers,
        { path: destinationRoot },
        false,
        asError(error)
      );
    }

    logger.debug(`Copied ${mappings.length} headers into ${destinationRoot}`);
    return mappings;
  }

  /**
   * Pair each discovered header with its real location
   */
  async mapHeaders(sourceRoot: string): Promise<HeaderMapping[]> {
    const headers = await this.findHeaders(sourceRoot);
    const mappings: HeaderMapping[] = [];

    for (const header of headers) {
      const relativePath = this.relativeHeaderPath(header, sourceRoot);
      mappings.push({ relativePath, resolvedLocation: await this.resolveHeader(header) });
    }

    return mappings.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
  }

  /**
   * Path of a header relative to the headers root, measured after the anchor
   * in both paths so differing absolute prefixes do not matter
   */
  relativeHeaderPath(headerPath: string, sourceRoot: string): string {
    const trimmedHeader = this.removeAnchorPrefix(headerPath);
    const trimmedRoot = this.removeAnchorPrefix(sourceRoot, true);

    if (!trimmedHeader.startsWith(trimmedRoot)) {
      throw new BuildError(
        BuildErrorCode.MalformedHeaderPath,
        `${headerPath} is not inside ${sourceRoot}`,
        BuildPhase.Headers,
        { path: headerPath }
      );
    }

    return trimmedHeader.slice(trimmedRoot.length).replace(/^\/+/, '');
  }

  /**
   * Recursively find header files, following symbolic links.
   * A link back into a directory on the current path is not followed again;
   * separate links to the same directory are each walked.
   */
  async findHeaders(sourceRoot: string): Promise<string[]> {
    const found: string[] = [];

    const walk = async (dir: string, ancestors: ReadonlySet<string>): Promise<void> => {
      const real = await realpath(dir);
      if (ancestors.has(real)) {
        logger.debug(`Not following ${dir} back into ${real}`);
        return;
      }
      const chain = new Set(ancestors).add(real);

      const entries = await readdir(dir);
      for (const name of entries.sort()) {
        const entryPath = join(dir, name);
        let entryStat: Stats;
        try {
          entryStat = await stat(entryPath);
        } catch (error) {
          throw new BuildError(
            BuildErrorCode.FileSystemError,
            `Could not read header entry ${entryPath}: ${errorMessage(error)}`,
            BuildPhase.Headers,
            { path: entryPath },
            false,
            asError(error)
          );
        }

        if (entryStat.isDirectory()) {
          await walk(entryPath, chain);
        } else if (entryStat.isFile() && this.extensions.has(extname(name))) {
          found.push(entryPath);
        }
      }
    };

    try {
      await walk(resolve(sourceRoot), new Set());
    } catch (error) {
      if (error instanceof BuildError) {
        throw error;
      }
      throw new BuildError(
        BuildErrorCode.FileSystemError,
        `Could not search ${sourceRoot} for headers: ${errorMessage(error)}`,
        BuildPhase.Headers,
        { path: sourceRoot },
        false,
        asError(error)
      );
    }

    return found;
  }

  private async resolveHeader(header: string): Promise<string> {
    try {
      return await realpath(header);
    } catch (error) {
      throw new BuildError(
        BuildErrorCode.FileSystemError,
        `Could not resolve header ${header}: ${errorMessage(error)}`,
        BuildPhase.Headers,
        { path: header },
        false,
        asError(error)
      );
    }
  }

  private removeAnchorPrefix(path: string, isDirectory = false): string {
    let fullPath = resolve(path).split(sep).join('/');
    if (isDirectory) {
      fullPath += '/';
    }

    const index = fullPath.indexOf(this.anchor);
    if (index === -1) {
      throw new BuildError(
        BuildErrorCode.MalformedHeaderPath,
        `Could not copy headers: path does not contain '${this.anchor}': ${fullPath}`,
        BuildPhase.Headers,
        { path: fullPath }
      );
    }

    return fullPath.slice(index + this.anchor.length);
  }
}

/**
 * Flatten a header tree with the default anchor
 */
export async function flattenHeaders(
  sourceRoot: string,
  destinationRoot: string,
  options: HeaderResolverOptions = {}
): Promise<HeaderMapping[]> {
  return new HeaderResolver(options).flattenHeaders(sourceRoot, destinationRoot);
}
