/**
 * Tests for build settings and naming tables
 */

import { tmpdir } from 'os';
import { join } from 'path';
import { BuildErrorCode, DistributionMode, LogLevel } from '../types';
import {
  DISTRIBUTION_MODES,
  TOOLCHAIN,
  defaultCacheRoot,
  loadBuildSettings,
  realFrameworkName
} from '../config';

describe('loadBuildSettings', () => {
  test('should fall back to defaults for an empty environment', () => {
    expect(loadBuildSettings({})).toEqual({
      cacheRoot: defaultCacheRoot(),
      logLevel: LogLevel.Info,
      xcodebuildPath: TOOLCHAIN.XCODEBUILD,
      tmpRoot: tmpdir()
    });
  });

  test('should read every setting from the environment', () => {
    expect(loadBuildSettings({
      FRAMEWORK_CACHE_DIR: '/var/cache/frameworks',
      LOG_LEVEL: 'debug',
      XCODEBUILD_PATH: '/opt/xcode/xcodebuild',
      BUILD_TMP_DIR: '/scratch'
    })).toEqual({
      cacheRoot: '/var/cache/frameworks',
      logLevel: LogLevel.Debug,
      xcodebuildPath: '/opt/xcode/xcodebuild',
      tmpRoot: '/scratch'
    });
  });

  test('should trim configured paths', () => {
    expect(loadBuildSettings({ BUILD_TMP_DIR: ' /scratch ' }).tmpRoot).toBe('/scratch');
  });

  test('should reject an unknown log level', () => {
    expect(() => loadBuildSettings({ LOG_LEVEL: 'loud' }))
      .toThrow(/^Invalid build configuration: Invalid environment: LOG_LEVEL: /);
  });

  test('should reject a blank path', () => {
    let caught: unknown;
    try {
      loadBuildSettings({ FRAMEWORK_CACHE_DIR: '   ' });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeBuildError(BuildErrorCode.InvalidConfig);
  });
});

describe('defaultCacheRoot', () => {
  const originalXdg = process.env.XDG_CACHE_HOME;
  const testOffDarwin = process.platform === 'darwin' ? test.skip : test;

  afterEach(() => {
    if (originalXdg === undefined) {
      delete process.env.XDG_CACHE_HOME;
    } else {
      process.env.XDG_CACHE_HOME = originalXdg;
    }
  });

  test('should end in the tool directory', () => {
    expect(defaultCacheRoot().endsWith('framework-forge')).toBe(true);
  });

  testOffDarwin('should honour XDG_CACHE_HOME', () => {
    process.env.XDG_CACHE_HOME = '/xdg/cache';
    expect(defaultCacheRoot()).toBe(join('/xdg/cache', 'framework-forge'));
  });
});

describe('naming tables', () => {
  test('should map renamed targets to their product names', () => {
    expect(realFrameworkName('PromisesObjC')).toBe('FBLPromises');
    expect(realFrameworkName('Protobuf')).toBe('protobuf');
  });

  test('should keep every other name', () => {
    expect(realFrameworkName('Example')).toBe('Example');
    expect(realFrameworkName('constructor')).toBe('constructor');
  });

  test('should give each distribution mode a marker and namespace', () => {
    expect(DISTRIBUTION_MODES[DistributionMode.Zip]).toEqual({ cacheDir: '', marker: '-DFIREBASE_BUILD_ZIP_FILE' });
    expect(DISTRIBUTION_MODES[DistributionMode.Carthage]).toEqual({
      cacheDir: 'carthage',
      marker: '-DFIREBASE_BUILD_CARTHAGE'
    });
  });
});
