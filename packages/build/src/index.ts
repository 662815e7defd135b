/**
 * @fileoverview Multi-architecture framework build tooling
 *
 * Compiles an Xcode scheme once per architecture group with xcodebuild,
 * merges the slices into an xcframework and keeps the result in an
 * on-disk cache keyed by target, version and distribution mode.
 *
 * @example
 * ```ts
 * import { FrameworkBuilder, createArtifactCache, Architecture } from '@framework-forge/build';
 *
 * const builder = new FrameworkBuilder({
 *   projectDir: '/tmp/project',
 *   cache: createArtifactCache('/tmp/framework-cache')
 * });
 * const path = await builder.buildFramework('Example', '1.0.0', {
 *   architectures: [Architecture.ARM64, Architecture.X86_64]
 * });
 * ```
 */

export * from './types.js';
export * from './architectures.js';
export * from './config.js';
export * from './compile-framework.js';
export * from './assemble-framework.js';
export * from './headers.js';
export * from './framework-builder.js';
export * from './utils/cache.js';
export * from './utils/process.js';
export * from './utils/fs.js';
export {
  Logger,
  ProgressReporter,
  configureLogger,
  createLogger,
  formatDuration,
  logger
} from './utils/logger.js';
export type { LoggerConfig } from './utils/logger.js';

// Version information
export const BUILD_VERSION = '0.1.0';
export const BUILD_SDK_NAME = '@framework-forge/build';
