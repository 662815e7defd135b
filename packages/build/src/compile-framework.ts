/**
 * Per-architecture-group framework compilation using xcodebuild
 */

import { join } from 'path';
import { writeFile } from 'fs/promises';
import {
  Architecture,
  ArchitectureGroup,
  DistributionMode,
  ThinBinaryLocation,
  BuildError,
  BuildErrorCode,
  BuildPhase,
  errorMessage,
  asError
} from './types.js';
import {
  ALL_ARCHITECTURES,
  CATALYST_ARCHITECTURE,
  CATALYST_BUILD_ARCHITECTURE,
  extraCompilerFlags,
  platformFolder,
  platformFor,
  sdkFor
} from './architectures.js';
import {
  DEFAULT_CONFIG,
  DISTRIBUTION_MODES,
  TOOLCHAIN,
  realFrameworkName
} from './config.js';
import { ProcessExecutor, createExecutor } from './utils/process.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('compile');

/**
 * Architecture pairs that share a toolchain pass when both are requested.
 * xcframework does not merge slices itself, but it accepts one fat
 * framework per platform, so these are built together.
 */
export const LEGACY_PAIRS: readonly (readonly [Architecture, Architecture])[] = [
  [Architecture.ARMv7, Architecture.ARM64],
  [Architecture.I386, Architecture.X86_64]
];

/**
 * Split requested architectures into toolchain invocations.
 *
 * Legacy pairs come first, in `LEGACY_PAIRS` order; every other
 * architecture becomes a singleton group in declaration order.
 */
export function groupArchitectures(requested: Iterable<Architecture>): ArchitectureGroup[] {
  const remaining = new Set(requested);
  const groups: ArchitectureGroup[] = [];

  for (const pair of LEGACY_PAIRS) {
    if (pair.every(arch => remaining.has(arch))) {
      groups.push([...pair]);
      pair.forEach(arch => remaining.delete(arch));
    }
  }

  for (const arch of ALL_ARCHITECTURES) {
    if (remaining.has(arch)) {
      groups.push([arch]);
    }
  }

  return groups;
}

/** Options for the framework compiler */
export interface FrameworkCompilerOptions {
  /** Directory holding the generated workspace and Pods */
  projectDir: string;
  /** Distribution mode, selects the compiler marker flag */
  mode?: DistributionMode;
  /** Replaces the mode's default marker flag in OTHER_CFLAGS */
  variantMarker?: string;
  /** Process executor, defaults to spawning real processes */
  executor?: ProcessExecutor;
  /** Path of the xcodebuild binary */
  xcodebuildPath?: string;
  /** Workspace file name inside the project directory */
  workspace?: string;
}

/**
 * Drives one xcodebuild invocation per architecture group
 */
export class FrameworkCompiler {
  private readonly projectDir: string;
  private readonly mode: DistributionMode;
  private readonly variantMarker: string;
  private readonly executor: ProcessExecutor;
  private readonly xcodebuildPath: string;
  private readonly workspace: string;

  constructor(options: FrameworkCompilerOptions) {
    this.projectDir = options.projectDir;
    this.mode = options.mode ?? DistributionMode.Zip;
    this.variantMarker = options.variantMarker ?? DISTRIBUTION_MODES[this.mode].marker;
    this.executor = options.executor ?? createExecutor();
    this.xcodebuildPath = options.xcodebuildPath ?? TOOLCHAIN.XCODEBUILD;
    this.workspace = options.workspace ?? DEFAULT_CONFIG.WORKSPACE;
  }

  /**
   * Compile one architecture group into a thin framework
   */
  async buildGroup(
    targetName: string,
    group: ArchitectureGroup,
    buildRootDir: string,
    logRootDir: string
  ): Promise<ThinBinaryLocation> {
    const primary = this.primaryArchitecture(group);
    const args = this.buildArguments(targetName, group, buildRootDir);
    const logFile = this.logFilePath(targetName, group, logRootDir);

    logger.step(
      `Compiling ${targetName} for ${primary} with command:\n` +
      `${this.xcodebuildPath} ${args.join(' ')}`
    );

    const result = await this.executor.run(this.xcodebuildPath, args, { captureOutput: true });

    if (!result.ok) {
      await this.writeFailureLog(logFile, result.output, targetName, primary);
      throw new BuildError(
        BuildErrorCode.CompileFailed,
        `Error building ${targetName} for ${primary}. Code: ${result.exitCode}. ` +
          `See the build log at ${logFile}`,
        BuildPhase.Compile,
        {
          targetName,
          architecture: primary,
          exitCode: result.exitCode,
          logFile,
          output: result.output
        }
      );
    }

    try {
      await writeFile(logFile, result.output, 'utf8');
    } catch (error) {
      logger.warn(`Could not write build log ${logFile}: ${errorMessage(error)}`);
    }

    logger.success(
      `Successfully built ${targetName} for ${primary}. Build log can be found at ${logFile}`
    );

    return {
      path: this.thinBinaryPath(targetName, group, buildRootDir),
      group
    };
  }

  /**
   * xcodebuild arguments for one group, in invocation order
   */
  buildArguments(targetName: string, group: ArchitectureGroup, buildRootDir: string): string[] {
    const primary = this.primaryArchitecture(group);
    const platform = platformFor(primary);
    const isCatalyst = primary === CATALYST_ARCHITECTURE;
    const archs = isCatalyst ? CATALYST_BUILD_ARCHITECTURE : group.join(' ');
    const cFlags = [
      'OTHER_CFLAGS=$(value)',
      this.variantMarker,
      ...extraCompilerFlags(platform)
    ].join(' ');

    return [
      'build',
      '-configuration', TOOLCHAIN.CONFIGURATION,
      '-workspace', join(this.projectDir, this.workspace),
      '-scheme', targetName,
      'GCC_GENERATE_DEBUGGING_SYMBOLS=No',
      `ARCHS=${archs}`,
      `VALID_ARCHS=${archs}`,
      'ONLY_ACTIVE_ARCH=NO',
      'BUILD_LIBRARIES_FOR_DISTRIBUTION=YES',
      `SUPPORTS_MACCATALYST=${isCatalyst ? 'YES' : 'NO'}`,
      `BUILD_DIR=${buildRootDir}`,
      '-sdk', sdkFor(platform),
      cFlags
    ];
  }

  /**
   * Where the toolchain leaves the framework for a group
   */
  thinBinaryPath(targetName: string, group: ArchitectureGroup, buildRootDir: string): string {
    const folder = platformFolder(platformFor(this.primaryArchitecture(group)));
    return join(
      buildRootDir,
      `Release-${folder}`,
      targetName,
      `${realFrameworkName(targetName)}.${TOOLCHAIN.THIN_EXTENSION}`
    );
  }

  logFilePath(targetName: string, group: ArchitectureGroup, logRootDir: string): string {
    const primary = this.primaryArchitecture(group);
    return join(logRootDir, `${targetName}-${primary}-${sdkFor(platformFor(primary))}.txt`);
  }

  private primaryArchitecture(group: ArchitectureGroup): Architecture {
    if (group.length === 0) {
      throw new BuildError(
        BuildErrorCode.InvalidConfig,
        'Architecture group is empty',
        BuildPhase.Compile
      );
    }
    return group[0];
  }

  private async writeFailureLog(
    logFile: string,
    output: string,
    targetName: string,
    architecture: Architecture
  ): Promise<void> {
    try {
      await writeFile(logFile, output, 'utf8');
    } catch (error) {
      throw new BuildError(
        BuildErrorCode.LogWriteFailed,
        `${logFile} (while reporting a failed build of ${targetName} for ${architecture}): ${errorMessage(error)}`,
        BuildPhase.Compile,
        { targetName, architecture, logFile, output },
        false,
        asError(error)
      );
    }
  }
}

/**
 * Create a framework compiler for a project directory
 */
export function createFrameworkCompiler(
  projectDir: string,
  options: Omit<FrameworkCompilerOptions, 'projectDir'> = {}
): FrameworkCompiler {
  return new FrameworkCompiler({ ...options, projectDir });
}
