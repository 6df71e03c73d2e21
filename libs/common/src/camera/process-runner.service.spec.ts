import { ProcessRunnerService, isMissingBinaryError } from './process-runner.service';

describe('ProcessRunnerService', () => {
  const runner = new ProcessRunnerService();

  it('collects output of a successful run', async () => {
    await expect(runner.run(process.execPath, ['-e', 'process.stdout.write("frame")'], 5000)).resolves.toEqual({
      exitCode: 0,
      signal: null,
      stdout: 'frame',
      stderr: '',
      timedOut: false,
    });
  });

  it('resolves with the exit code of a failing run', async () => {
    const result = await runner.run(process.execPath, ['-e', 'process.stderr.write("broken"); process.exit(3)'], 5000);

    expect(result).toMatchObject({ exitCode: 3, stderr: 'broken', timedOut: false });
  });

  it('kills runs that outlive the timeout', async () => {
    const result = await runner.run(process.execPath, ['-e', 'setTimeout(() => {}, 5000)'], 100);

    expect(result.timedOut).toBe(true);
    expect(result.signal).toBe('SIGKILL');
    expect(result.exitCode).toBeNull();
  });

  it('rejects when the binary does not exist', async () => {
    const run = runner.run('queue-watch-missing-binary', [], 1000);

    await expect(run).rejects.toMatchObject({ code: 'ENOENT' });
    expect(isMissingBinaryError(await run.catch((error: unknown) => error))).toBe(true);
  });

  it('resolves binaries on PATH', async () => {
    await expect(runner.resolveBinary('queue-watch-missing-binary')).resolves.toBeNull();
    await expect(runner.resolveBinary(process.execPath)).resolves.toBe(process.execPath);
  });
});
