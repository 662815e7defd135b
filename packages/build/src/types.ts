/**
 * Core type definitions for the framework build system
 */

/** CPU architectures a framework slice can be compiled for */
export enum Architecture {
  ARM64 = 'arm64',
  ARMv7 = 'armv7',
  I386 = 'i386',
  X86_64 = 'x86_64',
  /** Haswell slice, used for Mac Catalyst builds */
  X86_64H = 'x86_64h'
}

/** SDK/environment pairing an architecture is built against */
export enum TargetPlatform {
  Device = 'device',
  Simulator = 'simulator',
  Catalyst = 'catalyst'
}

/** Distribution modes; each one owns a cache namespace and a compiler marker */
export enum DistributionMode {
  Zip = 'zip',
  Carthage = 'carthage'
}

/** Log levels for build process */
export enum LogLevel {
  Error = 'error',
  Warn = 'warn',
  Info = 'info',
  Debug = 'debug',
  Trace = 'trace'
}

/** Static description of a target platform */
export interface PlatformDescriptor {
  /** SDK identifier passed to `-sdk` */
  sdk: string;
  /** Suffix of the `Release-<folder>` directory the toolchain writes into */
  folder: string;
  /** Extra C flags appended to OTHER_CFLAGS */
  cFlags: string[];
}

/** Architectures compiled together in one toolchain invocation */
export type ArchitectureGroup = readonly Architecture[];

/** Outcome of a single external process run */
export type BuildResult =
  | { ok: true; output: string }
  | { ok: false; exitCode: number; output: string };

/** Options for running an external process */
export interface RunOptions {
  /** Stream and keep the process output */
  captureOutput?: boolean;
  /** Working directory */
  cwd?: string;
  /** Extra environment variables merged over process.env */
  env?: Record<string, string>;
}

/** Output of one group build, not yet merged */
export interface ThinBinaryLocation {
  path: string;
  group: ArchitectureGroup;
}

/** A finished artifact living in the cache */
export interface CachedArtifact {
  path: string;
  targetName: string;
  version: string;
  mode: DistributionMode;
}

/** Where a resolved header is copied to, relative to the headers root */
export interface HeaderMapping {
  relativePath: string;
  resolvedLocation: string;
}

/** Build phases */
export enum BuildPhase {
  Initialize = 'initialize',
  Configure = 'configure',
  Compile = 'compile',
  Combine = 'combine',
  Headers = 'headers',
  Cache = 'cache',
  Complete = 'complete'
}

/** Build error types */
export enum BuildErrorCode {
  // Configuration errors (1000-1099)
  InvalidConfig = 1000,
  InvalidArchitecture = 1001,
  MalformedHeaderPath = 1002,

  // Compilation errors (3000-3099)
  CompileFailed = 3000,
  CombineFailed = 3001,

  // System errors (5000-5099)
  FileSystemError = 5000,
  ProcessFailed = 5001,
  LogWriteFailed = 5002,

  // Cache errors (6000-6099)
  CacheWriteFailed = 6000
}

/** Diagnostic context attached to a build error */
export interface BuildErrorContext {
  targetName?: string;
  architecture?: Architecture;
  exitCode?: number;
  logFile?: string;
  output?: string;
  path?: string;
}

/** Build error class */
export class BuildError extends Error {
  constructor(
    public readonly code: BuildErrorCode,
    public readonly details: string,
    public readonly phase?: BuildPhase,
    public readonly context: BuildErrorContext = {},
    public readonly recoverable: boolean = false,
    public readonly cause?: Error
  ) {
    super(`${BuildError.getMessageForCode(code)}: ${details}`);
    this.name = 'BuildError';
    Object.setPrototypeOf(this, BuildError.prototype);
  }

  static getMessageForCode(code: BuildErrorCode): string {
    const messages: Record<BuildErrorCode, string> = {
      [BuildErrorCode.InvalidConfig]: 'Invalid build configuration',
      [BuildErrorCode.InvalidArchitecture]: 'Unknown architecture',
      [BuildErrorCode.MalformedHeaderPath]: 'Malformed header path',
      [BuildErrorCode.CompileFailed]: 'Framework compilation failed',
      [BuildErrorCode.CombineFailed]: 'Creating the xcframework failed',
      [BuildErrorCode.FileSystemError]: 'File system operation failed',
      [BuildErrorCode.ProcessFailed]: 'External process failed',
      [BuildErrorCode.LogWriteFailed]: 'Failed to write build log',
      [BuildErrorCode.CacheWriteFailed]: 'Failed to write to cache'
    };

    return messages[code];
  }

  toJSON(): object {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
      phase: this.phase,
      context: this.context,
      recoverable: this.recoverable,
      stack: this.stack
    };
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Narrow an unknown thrown value to an Error, for use as a `cause`
 */
export function asError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}
