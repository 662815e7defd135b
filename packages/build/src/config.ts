/**
 * Build configuration management and constants
 */

import { homedir, tmpdir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import {
  DistributionMode,
  LogLevel,
  BuildError,
  BuildErrorCode,
  BuildPhase
} from './types.js';

/** Default configuration values */
export const DEFAULT_CONFIG = {
  /** Cache directory name under the user's cache root */
  CACHE_DIR: 'framework-forge',

  /** Workspace generated in the project directory */
  WORKSPACE: 'FrameworkMaker.xcworkspace',

  /** Default log level */
  LOG_LEVEL: LogLevel.Info,

  /** Anchor every public header path must contain */
  HEADERS_ANCHOR: 'Pods/Headers/'
};

/** External toolchain */
export const TOOLCHAIN = {
  /** Compiler driver used for both thin builds and the combine step */
  XCODEBUILD: '/usr/bin/xcodebuild',

  /** Build configuration passed to `-configuration` */
  CONFIGURATION: 'release',

  /** Extension of a single-group build product */
  THIN_EXTENSION: 'framework',

  /** Extension of the merged multi-architecture container */
  CONTAINER_EXTENSION: 'xcframework'
};

/** Temporary directory names used while a framework is being built */
export const PATHS = {
  /** Merged containers are written here before moving into the cache */
  BUILD_OUTPUT: 'frameworks_being_built',

  /** Default location of per-group build logs */
  BUILD_LOGS: 'build_logs'
};

/** Per distribution mode: cache namespace and compiler marker */
export const DISTRIBUTION_MODES: Record<DistributionMode, { cacheDir: string; marker: string }> = {
  [DistributionMode.Zip]: { cacheDir: '', marker: '-DFIREBASE_BUILD_ZIP_FILE' },
  [DistributionMode.Carthage]: { cacheDir: 'carthage', marker: '-DFIREBASE_BUILD_CARTHAGE' }
};

/**
 * Targets whose toolchain product name differs from the scheme name.
 * Anything not listed keeps its own name.
 */
export const PRODUCT_NAME_OVERRIDES: ReadonlyMap<string, string> = new Map([
  ['PromisesObjC', 'FBLPromises'],
  ['Protobuf', 'protobuf']
]);

/** Environment variable names */
export const ENV_VARS = {
  /** Root of the artifact cache */
  CACHE_DIR: 'FRAMEWORK_CACHE_DIR',

  /** Log level */
  LOG_LEVEL: 'LOG_LEVEL',

  /** Override for the xcodebuild binary */
  XCODEBUILD_PATH: 'XCODEBUILD_PATH',

  /** Root for temporary build directories */
  TMP_DIR: 'BUILD_TMP_DIR'
} as const;

/** Settings resolved from the environment */
export interface BuildSettings {
  cacheRoot: string;
  logLevel: LogLevel;
  xcodebuildPath: string;
  tmpRoot: string;
}

const nonEmptyPath = z.string().trim().min(1);

const settingsSchema = z.object({
  [ENV_VARS.CACHE_DIR]: nonEmptyPath.optional(),
  [ENV_VARS.LOG_LEVEL]: z.nativeEnum(LogLevel).optional(),
  [ENV_VARS.XCODEBUILD_PATH]: nonEmptyPath.optional(),
  [ENV_VARS.TMP_DIR]: nonEmptyPath.optional()
});

/**
 * Default cache root, following the platform's conventional cache location
 */
export function defaultCacheRoot(): string {
  const base = process.platform === 'darwin'
    ? join(homedir(), 'Library', 'Caches')
    : process.env.XDG_CACHE_HOME || join(homedir(), '.cache');
  return join(base, DEFAULT_CONFIG.CACHE_DIR);
}

/**
 * Resolve build settings from environment variables
 */
export function loadBuildSettings(
  env: NodeJS.ProcessEnv = process.env
): BuildSettings {
  const parsed = settingsSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new BuildError(
      BuildErrorCode.InvalidConfig,
      `Invalid environment: ${issues}`,
      BuildPhase.Configure
    );
  }

  const values = parsed.data;

  return {
    cacheRoot: values[ENV_VARS.CACHE_DIR] ?? defaultCacheRoot(),
    logLevel: values[ENV_VARS.LOG_LEVEL] ?? DEFAULT_CONFIG.LOG_LEVEL,
    xcodebuildPath: values[ENV_VARS.XCODEBUILD_PATH] ?? TOOLCHAIN.XCODEBUILD,
    tmpRoot: values[ENV_VARS.TMP_DIR] ?? tmpdir()
  };
}

/**
 * Name of the product the toolchain emits for a target
 */
export function realFrameworkName(targetName: string): string {
  return PRODUCT_NAME_OVERRIDES.get(targetName) ?? targetName;
}
