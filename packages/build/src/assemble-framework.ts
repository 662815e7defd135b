/**
 * Assembles per-group framework builds into one xcframework
 */

import { join } from 'path';
import { tmpdir } from 'os';
import {
  Architecture,
  ThinBinaryLocation,
  BuildError,
  BuildErrorCode,
  BuildPhase,
  errorMessage,
  asError
} from './types.js';
import { PATHS, TOOLCHAIN } from './config.js';
import { FrameworkCompiler, groupArchitectures } from './compile-framework.js';
import { ProcessExecutor, createExecutor } from './utils/process.js';
import { ensureDirectory, recreateDirectory } from './utils/fs.js';
import { createLogger, ProgressReporter } from './utils/logger.js';

const logger = createLogger('assemble');

export interface FrameworkAssemblerOptions {
  /** Directory holding the generated workspace; group builds go beneath it */
  projectDir: string;
  /** Compiler used for each architecture group */
  compiler: FrameworkCompiler;
  /** Executor for the combine step */
  executor?: ProcessExecutor;
  /** Path of the xcodebuild binary */
  xcodebuildPath?: string;
  /** Root for the temporary output and default log directories */
  tmpRoot?: string;
}

export interface AssembleOptions {
  /** Directory for build logs, defaults to a temporary one */
  logsOutputDir?: string;
}

export class FrameworkAssembler {
  private readonly projectDir: string;
  private readonly compiler: FrameworkCompiler;
  private readonly executor: ProcessExecutor;
  private readonly xcodebuildPath: string;
  private readonly tmpRoot: string;

  constructor(options: FrameworkAssemblerOptions) {
    this.projectDir = options.projectDir;
    this.compiler = options.compiler;
    this.executor = options.executor ?? createExecutor();
    this.xcodebuildPath = options.xcodebuildPath ?? TOOLCHAIN.XCODEBUILD;
    this.tmpRoot = options.tmpRoot ?? tmpdir();
  }

  /** Directory the merged container is written to */
  get outputDir(): string {
    return join(this.tmpRoot, PATHS.BUILD_OUTPUT);
  }

  /** Log directory used when the caller gives none */
  get defaultLogsDir(): string {
    return join(this.tmpRoot, PATHS.BUILD_LOGS);
  }

  /**
   * Build every requested architecture and merge the results.
   * Returns the path of the merged container.
   */
  async assemble(
    targetName: string,
    architectures: Iterable<Architecture>,
    options: AssembleOptions = {}
  ): Promise<string> {
    const groups = groupArchitectures(architectures);
    if (groups.length === 0) {
      throw new BuildError(
        BuildErrorCode.InvalidConfig,
        `No architectures requested for ${targetName}`,
        BuildPhase.Initialize,
        { targetName }
      );
    }

    const logsDir = options.logsOutputDir ?? this.defaultLogsDir;
    await this.prepareDirectories(targetName, logsDir);

    const progress = new ProgressReporter(`Building ${targetName}`, groups.length + 1, logger);

    try {
      const thinBinaries: ThinBinaryLocation[] = [];
      for (const group of groups) {
        progress.update(1, `Compiling ${group.join(' + ')}`);
        const buildDir = join(this.projectDir, group[0]);
        thinBinaries.push(await this.compiler.buildGroup(targetName, group, buildDir, logsDir));
      }

      progress.update(1, 'Creating xcframework');
      const frameworkPath = await this.combine(targetName, thinBinaries);

      progress.complete(frameworkPath);
      return frameworkPath;
    } catch (error) {
      progress.fail(errorMessage(error));
      throw error;
    }
  }

  /**
   * Merge thin frameworks with `xcodebuild -create-xcframework`.
   *
   * The merge rejects legacy slices (armv7, i386) next to their 64-bit
   * counterparts of the same platform; that failure is reported as-is.
   */
  async combine(targetName: string, thinBinaries: ThinBinaryLocation[]): Promise<string> {
    const frameworkPath = join(this.outputDir, `${targetName}.${TOOLCHAIN.CONTAINER_EXTENSION}`);
    const inputArgs = thinBinaries.flatMap(thin => ['-framework', thin.path]);

    logger.debug(`Creating xcframework ${frameworkPath} from ${inputArgs.join(' ')}`);

    const result = await this.executor.run(
      this.xcodebuildPath,
      ['-create-xcframework', '-output', frameworkPath, ...inputArgs]
    );

    if (!result.ok) {
      throw new BuildError(
        BuildErrorCode.CombineFailed,
        `xcodebuild -create-xcframework exited with ${result.exitCode} when building ${targetName}. ` +
          `Output:\n${result.output}`,
        BuildPhase.Combine,
        { targetName, exitCode: result.exitCode, output: result.output, path: frameworkPath }
      );
    }

    logger.success(`xcodebuild -create-xcframework for ${targetName} succeeded`);
    return frameworkPath;
  }

  private async prepareDirectories(targetName: string, logsDir: string): Promise<void> {
    try {
      // the output directory is scratch space, not the cache
      await recreateDirectory(this.outputDir);
      await ensureDirectory(logsDir);
    } catch (error) {
      throw new BuildError(
        BuildErrorCode.FileSystemError,
        `Failure creating temporary directory while building ${targetName}: ${errorMessage(error)}`,
        BuildPhase.Initialize,
        { targetName, path: this.outputDir },
        false,
        asError(error)
      );
    }
  }
}
