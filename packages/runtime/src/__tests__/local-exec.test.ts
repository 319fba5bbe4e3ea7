/**
 * LocalExec tests (runs the current node binary)
 */

import { LocalExec, getLocalExec } from '../index.js';

describe('LocalExec', () => {
  const exec = new LocalExec();

  it('resolves with output and a zero exit code', async () => {
    const result = await exec.run(process.execPath, ['-e', 'process.stdout.write("up")']);

    expect(result.code).toBe(0);
    expect(result.stdout).toBe('up');
    expect(result.stderr).toBe('');
  });

  it('resolves non-zero exits with their code and stderr', async () => {
    const result = await exec.run(process.execPath, ['-e', 'process.stderr.write("no such service"); process.exit(3)']);

    expect(result.code).toBe(3);
    expect(result.stderr).toBe('no such service');
  });

  it('rejects when the binary cannot be spawned', async () => {
    await expect(exec.run('bgctl-test-missing-binary', [])).rejects.toThrow(
      /^Cannot run bgctl-test-missing-binary: /,
    );
  });

  it('rejects when the timeout kills the command', async () => {
    await expect(exec.run(process.execPath, ['-e', 'setTimeout(() => {}, 5000)'], { timeout: 200 })).rejects.toThrow(
      `${process.execPath} timed out after 200ms`,
    );
  });

  it('shares one instance', () => {
    expect(getLocalExec()).toBe(getLocalExec());
  });
});
