import { describe, expect, it } from 'vitest';
import { ProcessError } from '../../../src/utils/errors.js';
import { buildFilteredEnv, runProcess } from '../../../src/utils/process.js';

describe('buildFilteredEnv', () => {
  it('keeps only allowlisted variables that are set', () => {
    process.env.TASKPILOT_TEST_VAR = 'test-value';
    const env = buildFilteredEnv(['TASKPILOT_TEST_VAR', 'TASKPILOT_UNSET_VAR']);
    expect(env).toEqual({ TASKPILOT_TEST_VAR: 'test-value' });
    delete process.env.TASKPILOT_TEST_VAR;
  });
});

describe.skipIf(process.platform === 'win32')('runProcess', () => {
  it('feeds stdin and collects stdout', async () => {
    const out = await runProcess({ command: 'cat', args: [], stdin: 'hello', timeoutMs: 5000 });
    expect(out.stdout).toBe('hello');
  });

  it('keeps a multibyte character written across two chunks', async () => {
    const out = await runProcess({
      command: 'sh',
      args: ['-c', "printf 'price: \\342\\202'; sleep 0.2; printf '\\254'"],
      timeoutMs: 5000,
    });
    expect(out.stdout).toBe('price: €');
  });

  it('rejects with the exit code on failure', async () => {
    const promise = runProcess({ command: 'sh', args: ['-c', 'exit 2'], timeoutMs: 5000 });
    await expect(promise).rejects.toBeInstanceOf(ProcessError);
    await expect(promise).rejects.toMatchObject({ exitCode: 2, timedOut: false });
  });

  it('rejects when the command cannot start', async () => {
    await expect(
      runProcess({ command: 'taskpilot-no-such-binary', args: [], timeoutMs: 5000 }),
    ).rejects.toThrow('taskpilot-no-such-binary failed to start');
  });

  it('kills a process that outlives its timeout', async () => {
    await expect(runProcess({ command: 'sleep', args: ['5'], timeoutMs: 100 })).rejects.toMatchObject({
      timedOut: true,
    });
  });
});
