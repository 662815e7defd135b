/**
 * Tests for the spawn-backed process executor
 */

import { realpath } from 'fs/promises';
import { BuildErrorCode } from '../../types';
import { SpawnExecutor, TASK_COMPLETED_MARKER, createExecutor } from '../process';
import { cleanup, createSandbox } from '../../__tests__/test-utils';

function script(source: string): string[] {
  return ['-e', source];
}

describe('SpawnExecutor', () => {
  const node = process.execPath;
  let executor: SpawnExecutor;

  beforeEach(() => {
    executor = new SpawnExecutor();
  });

  test('should be the default executor', () => {
    expect(createExecutor()).toBeInstanceOf(SpawnExecutor);
  });

  test('should capture standard output', async () => {
    const result = await executor.run(node, script('process.stdout.write("compiled")'), {
      captureOutput: true
    });

    expect(result).toEqual({ ok: true, output: 'compiled' });
  });

  test('should capture standard error of a failing process', async () => {
    const result = await executor.run(
      node,
      script('process.stderr.write("linker error"); process.exitCode = 65'),
      { captureOutput: true }
    );

    expect(result).toEqual({ ok: false, exitCode: 65, output: 'linker error' });
  });

  test('should keep output written right before exit', async () => {
    const result = await executor.run(
      node,
      script('process.stdout.write("x".repeat(200000)); process.exit(0)'),
      { captureOutput: true }
    );

    expect(result.ok).toBe(true);
    expect(result.output.replace(/\n/g, '')).toHaveLength(200000);
  });

  test('should report the completion marker without capture', async () => {
    const result = await executor.run(node, script('process.stdout.write("ignored")'));

    expect(result).toEqual({ ok: true, output: TASK_COMPLETED_MARKER });
  });

  test('should report the exit code without capture', async () => {
    const result = await executor.run(node, script('process.exit(3)'));

    expect(result).toEqual({ ok: false, exitCode: 3, output: TASK_COMPLETED_MARKER });
  });

  test('should pass extra environment variables', async () => {
    const result = await executor.run(node, script('process.stdout.write(process.env.FORGE_TEST_VALUE ?? "")'), {
      captureOutput: true,
      env: { FORGE_TEST_VALUE: 'placeholder' }
    });

    expect(result.output).toBe('placeholder');
  });

  test('should run in the requested directory', async () => {
    const sandbox = await realpath(await createSandbox());
    try {
      const result = await executor.run(node, script('process.stdout.write(process.cwd())'), {
        captureOutput: true,
        cwd: sandbox
      });

      expect(result.output).toBe(sandbox);
    } finally {
      await cleanup(sandbox);
    }
  });

  test('should fail when the command cannot be started', async () => {
    await expect(executor.run('/nonexistent/xcodebuild', ['-version']))
      .rejects.toBeBuildError(BuildErrorCode.ProcessFailed);
  });
});
