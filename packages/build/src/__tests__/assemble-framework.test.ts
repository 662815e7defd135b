/**
 * Tests for assembling group builds into an xcframework
 */

import { readdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { Architecture, BuildErrorCode } from '../types';
import { FrameworkCompiler } from '../compile-framework';
import { FrameworkAssembler } from '../assemble-framework';
import { pathExists } from '../utils/fs';
import { FakeExecutor, argumentAfter, cleanup, createSandbox, writeFileDeep } from './test-utils';

const { ARM64, ARMv7, I386, X86_64 } = Architecture;

describe('FrameworkAssembler', () => {
  let sandbox: string;
  let projectDir: string;
  let tmpRoot: string;
  let executor: FakeExecutor;
  let assembler: FrameworkAssembler;

  beforeEach(async () => {
    sandbox = await createSandbox();
    projectDir = join(sandbox, 'project');
    tmpRoot = join(sandbox, 'tmp');
    executor = new FakeExecutor();
    assembler = new FrameworkAssembler({
      projectDir,
      compiler: new FrameworkCompiler({ projectDir, executor }),
      executor,
      tmpRoot
    });
  });

  afterEach(async () => {
    await cleanup(sandbox);
  });

  test('should place scratch directories under the temporary root', () => {
    expect(assembler.outputDir).toBe(join(tmpRoot, 'frameworks_being_built'));
    expect(assembler.defaultLogsDir).toBe(join(tmpRoot, 'build_logs'));
  });

  test('should compile each group into its own build directory', async () => {
    await assembler.assemble('Example', [ARM64, ARMv7, I386, X86_64]);

    expect(executor.compileRuns.map(run => argumentAfter(run.args, '-scheme'))).toEqual([
      'Example',
      'Example'
    ]);
    expect(executor.compileRuns.map(run => run.args.find(arg => arg.startsWith('BUILD_DIR=')))).toEqual([
      `BUILD_DIR=${join(projectDir, 'armv7')}`,
      `BUILD_DIR=${join(projectDir, 'i386')}`
    ]);
  });

  test('should merge the thin frameworks into the output directory', async () => {
    const frameworkPath = await assembler.assemble('Example', [X86_64, ARM64]);

    expect(frameworkPath).toBe(join(tmpRoot, 'frameworks_being_built', 'Example.xcframework'));
    expect(executor.combineRuns).toHaveLength(1);
    expect(executor.combineRuns[0].args).toEqual([
      '-create-xcframework',
      '-output', frameworkPath,
      '-framework', join(projectDir, 'arm64', 'Release-iphoneos', 'Example', 'Example.framework'),
      '-framework', join(projectDir, 'x86_64', 'Release-iphonesimulator', 'Example', 'Example.framework')
    ]);
    expect(executor.combineRuns[0].options).toEqual({});
  });

  test('should run the merge after every compile', async () => {
    await assembler.assemble('Example', [ARM64, X86_64]);

    expect(executor.runs.map(run => run.args[0])).toEqual(['build', 'build', '-create-xcframework']);
  });

  test('should clear leftovers from earlier builds', async () => {
    const stale = join(tmpRoot, 'frameworks_being_built', 'Stale.xcframework', 'Info.plist');
    await writeFileDeep(stale, 'old');

    await assembler.assemble('Example', [ARM64]);

    expect(await pathExists(stale)).toBe(false);
    expect(await readdir(assembler.outputDir)).toEqual(['Example.xcframework']);
  });

  test('should write logs to the default directory', async () => {
    await assembler.assemble('Example', [ARM64]);

    expect(await readFile(join(assembler.defaultLogsDir, 'Example-arm64-iphoneos.txt'), 'utf8'))
      .toBe('ran build');
  });

  test('should write logs to a requested directory', async () => {
    const logsOutputDir = join(sandbox, 'logs', 'nested');

    await assembler.assemble('Example', [I386], { logsOutputDir });

    expect(await readdir(logsOutputDir)).toEqual(['Example-i386-iphonesimulator.txt']);
  });

  test('should stop at the first failing group without merging', async () => {
    executor.respondWith(run => run.args.includes('ARCHS=arm64')
      ? { ok: false, exitCode: 65, output: 'compile error' }
      : { ok: true, output: 'ok' });

    await expect(assembler.assemble('Example', [ARM64, X86_64]))
      .rejects.toBeBuildError(BuildErrorCode.CompileFailed);
    expect(executor.compileRuns).toHaveLength(1);
    expect(executor.combineRuns).toHaveLength(0);
  });

  test('should report a failed merge with its output', async () => {
    executor.respondWith(run => run.args[0] === '-create-xcframework'
      ? { ok: false, exitCode: 70, output: 'both ios-arm64 and ios-armv7 represent two equivalent library definitions' }
      : { ok: true, output: 'ok' });

    await expect(assembler.assemble('Example', [ARM64])).rejects.toThrow(
      'Creating the xcframework failed: xcodebuild -create-xcframework exited with 70 when building Example. ' +
        'Output:\nboth ios-arm64 and ios-armv7 represent two equivalent library definitions'
    );
  });

  test('should reject an empty architecture list before running anything', async () => {
    await expect(assembler.assemble('Example', []))
      .rejects.toBeBuildError(BuildErrorCode.InvalidConfig);
    expect(executor.runs).toHaveLength(0);
  });

  test('should fail when the scratch directory cannot be created', async () => {
    await writeFile(join(sandbox, 'blocker'), 'not a directory');
    const blocked = new FrameworkAssembler({
      projectDir,
      compiler: new FrameworkCompiler({ projectDir, executor }),
      executor,
      tmpRoot: join(sandbox, 'blocker')
    });

    await expect(blocked.assemble('Example', [ARM64]))
      .rejects.toBeBuildError(BuildErrorCode.FileSystemError);
    expect(executor.runs).toHaveLength(0);
  });
});
