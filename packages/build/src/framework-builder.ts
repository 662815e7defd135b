/**
 * Builds a multi-architecture framework for a target and caches it
 */

import { Architecture, DistributionMode } from './types.js';
import { DEFAULT_ARCHITECTURES } from './architectures.js';
import { FrameworkCompiler } from './compile-framework.js';
import { FrameworkAssembler } from './assemble-framework.js';
import { ArtifactCache } from './utils/cache.js';
import { ProcessExecutor, createExecutor } from './utils/process.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('framework-builder');

export interface FrameworkBuilderOptions {
  /** Directory containing the generated workspace and Pods folder */
  projectDir: string;
  /** Cache the finished frameworks are moved into */
  cache: ArtifactCache;
  /** Distribution mode; also picks the cache namespace */
  mode?: DistributionMode;
  /** Compiler marker flag, defaults to the mode's */
  variantMarker?: string;
  /** Executor shared by the compiler and the combine step */
  executor?: ProcessExecutor;
  /** Path of the xcodebuild binary */
  xcodebuildPath?: string;
  /** Root for temporary build directories */
  tmpRoot?: string;
  /** Workspace file name inside the project directory */
  workspace?: string;
}

export interface BuildFrameworkOptions {
  /** Architectures to include, defaults to `DEFAULT_ARCHITECTURES` */
  architectures?: Iterable<Architecture>;
  /** Directory for build logs */
  logsOutputDir?: string;
  /** Rebuild even when the cache already holds this version */
  force?: boolean;
}

export class FrameworkBuilder {
  private readonly cache: ArtifactCache;
  private readonly mode: DistributionMode;
  private readonly assembler: FrameworkAssembler;

  constructor(options: FrameworkBuilderOptions) {
    const executor = options.executor ?? createExecutor();

    this.cache = options.cache;
    this.mode = options.mode ?? DistributionMode.Zip;

    const compiler = new FrameworkCompiler({
      projectDir: options.projectDir,
      mode: this.mode,
      variantMarker: options.variantMarker,
      executor,
      xcodebuildPath: options.xcodebuildPath,
      workspace: options.workspace
    });

    this.assembler = new FrameworkAssembler({
      projectDir: options.projectDir,
      compiler,
      executor,
      xcodebuildPath: options.xcodebuildPath,
      tmpRoot: options.tmpRoot
    });
  }

  /**
   * Build a framework and return its path in the cache
   */
  async buildFramework(
    targetName: string,
    version: string,
    options: BuildFrameworkOptions = {}
  ): Promise<string> {
    logger.info(`Building ${targetName}`);

    if (!options.force) {
      const cached = await this.cache.lookup(targetName, version, this.mode);
      if (cached) {
        logger.success(`Using cached ${targetName} ${version}: ${cached.path}`);
        return cached.path;
      }
    }

    const frameworkPath = await this.assembler.assemble(
      targetName,
      options.architectures ?? DEFAULT_ARCHITECTURES,
      { logsOutputDir: options.logsOutputDir }
    );

    const artifact = await this.cache.store(targetName, version, frameworkPath, this.mode);
    return artifact.path;
  }
}
