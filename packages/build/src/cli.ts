#!/usr/bin/env node
/**
 * CLI interface for the framework build system
 */

import { resolve } from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import {
  Architecture,
  BuildError,
  BuildErrorCode,
  BuildPhase,
  DistributionMode,
  LogLevel,
  errorMessage
} from './types.js';
import {
  ALL_ARCHITECTURES,
  DEFAULT_ARCHITECTURES,
  parseArchitectureList,
  platformFolder,
  platformFor,
  sdkFor
} from './architectures.js';
import { loadBuildSettings } from './config.js';
import { FrameworkBuilder } from './framework-builder.js';
import { flattenHeaders } from './headers.js';
import { createArtifactCache } from './utils/cache.js';
import { configureLogger, createLogger } from './utils/logger.js';
import { BUILD_VERSION } from './index.js';

const logger = createLogger('cli');
const program = new Command();

interface BuildCommandOptions {
  version: string;
  archs?: string;
  projectDir: string;
  logsDir?: string;
  carthage?: boolean;
  force?: boolean;
  verbose?: boolean;
}

interface CleanCommandOptions {
  target?: string;
  version?: string;
  carthage?: boolean;
}

function reportFailure(error: unknown, verbose = false): void {
  logger.failure(errorMessage(error));

  if (error instanceof BuildError) {
    if (error.context.logFile) {
      logger.error(`Build log: ${error.context.logFile}`);
    }
    if (verbose && error.context.output) {
      logger.error(error.context.output);
    }
  }

  process.exitCode = 1;
}

function modeFor(carthage?: boolean): DistributionMode {
  return carthage ? DistributionMode.Carthage : DistributionMode.Zip;
}

program
  .name('framework-forge')
  .description('Build multi-architecture xcframeworks with xcodebuild and cache them')
  .version(BUILD_VERSION)
  .enablePositionalOptions();

program
  .command('build')
  .description('Build a framework for every requested architecture and cache it')
  .argument('<target>', 'Scheme to build')
  .requiredOption('-v, --version <version>', 'Version the cached framework is stored under')
  .option('-a, --archs <archs>', `Comma separated architectures (default: ${DEFAULT_ARCHITECTURES.join(',')})`)
  .option('-p, --project-dir <dir>', 'Directory containing the generated workspace', '.')
  .option('-l, --logs-dir <dir>', 'Directory for build logs')
  .option('--carthage', 'Build for Carthage distribution')
  .option('--force', 'Rebuild even if the framework is cached')
  .option('--verbose', 'Enable debug logging')
  .action(async (target: string, options: BuildCommandOptions) => {
    try {
      const settings = loadBuildSettings();
      configureLogger({ level: options.verbose ? LogLevel.Debug : settings.logLevel });

      const architectures: Architecture[] = options.archs
        ? parseArchitectureList(options.archs)
        : [...DEFAULT_ARCHITECTURES];

      const builder = new FrameworkBuilder({
        projectDir: resolve(options.projectDir),
        cache: createArtifactCache(settings.cacheRoot),
        mode: modeFor(options.carthage),
        xcodebuildPath: settings.xcodebuildPath,
        tmpRoot: settings.tmpRoot
      });

      const frameworkPath = await builder.buildFramework(target, options.version, {
        architectures,
        logsOutputDir: options.logsDir ? resolve(options.logsDir) : undefined,
        force: options.force
      });

      logger.success(`Build completed: ${frameworkPath}`);
    } catch (error) {
      reportFailure(error, options.verbose);
    }
  });

program
  .command('copy-headers')
  .description('Copy a symlinked public headers tree into a plain directory')
  .argument('<source>', 'Headers directory below Pods/Headers/')
  .argument('<destination>', 'Directory to copy the headers into')
  .action(async (source: string, destination: string) => {
    try {
      const mappings = await flattenHeaders(resolve(source), resolve(destination));
      logger.success(`Copied ${mappings.length} headers to ${destination}`);
    } catch (error) {
      reportFailure(error);
    }
  });

program
  .command('clean-cache')
  .description('Remove cached frameworks')
  .option('-t, --target <target>', 'Only remove this target')
  .option('-v, --version <version>', 'Only remove this version')
  .option('--carthage', 'Use the Carthage cache namespace')
  .action(async (options: CleanCommandOptions) => {
    try {
      const cache = createArtifactCache(loadBuildSettings().cacheRoot);

      if (options.target || options.version) {
        if (!options.target || !options.version) {
          throw new BuildError(
            BuildErrorCode.InvalidConfig,
            '--target and --version must be given together',
            BuildPhase.Configure
          );
        }
        await cache.remove(options.target, options.version, modeFor(options.carthage));
        logger.success(`Removed ${options.target} ${options.version} from the cache`);
      } else {
        await cache.clear();
      }
    } catch (error) {
      reportFailure(error);
    }
  });

program
  .command('list-archs')
  .description('List supported architectures')
  .action(() => {
    console.log(chalk.bold('Supported architectures:'));
    for (const arch of ALL_ARCHITECTURES) {
      const platform = platformFor(arch);
      const isDefault = DEFAULT_ARCHITECTURES.includes(arch) ? chalk.green(' (default)') : '';
      console.log(
        `  ${chalk.cyan(arch.padEnd(8))} ${platform.padEnd(10)} ` +
        `${chalk.dim(`sdk=${sdkFor(platform)} folder=Release-${platformFolder(platform)}`)}${isDefault}`
      );
    }
  });

program.parseAsync(process.argv).catch(error => reportFailure(error));
