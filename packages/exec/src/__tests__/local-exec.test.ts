/**
 * Local Execution Tests
 */

import { CommandError } from '@wp-promote/shared';
import { ScriptedRunner } from '../../../../test/support/index.js';
import { runChecked } from '../local-exec.js';
import { PathToolProbe } from '../probe.js';

describe('runChecked', () => {
  it('should return the result of a successful command', async () => {
    const runner = new ScriptedRunner().respond(() => ({ stdout: 'ok' }));

    const result = await runChecked(runner, 'wp', ['core', 'version']);

    expect(result.stdout).toBe('ok');
  });

  it('should fall back to stdout when stderr is empty', async () => {
    const runner = new ScriptedRunner().respond(() => ({ code: 1, stdout: 'Error: not found' }));

    await expect(runChecked(runner, 'wp', ['db', 'check'])).rejects.toThrow('wp db exited with code 1: Error: not found');
  });

  it('should expose the exit code', async () => {
    const runner = new ScriptedRunner().respond(() => ({ code: 2, stderr: 'bad' }));

    await expect(runChecked(runner, 'tar', ['-tzf'])).rejects.toMatchObject({ exitCode: 2, command: 'tar -tzf' });
    await expect(runChecked(runner, 'tar', ['-tzf'])).rejects.toBeInstanceOf(CommandError);
  });
});

describe('PathToolProbe', () => {
  it('should report a tool found on PATH', async () => {
    const runner = new ScriptedRunner().respond((_file, args) =>
      args.includes('rsync') ? { stdout: '/usr/bin/rsync\n' } : { code: 1 },
    );
    const probe = new PathToolProbe(runner);

    expect(await probe.isAvailable('rsync')).toBe(true);
    expect(await probe.isAvailable('wp')).toBe(false);
  });
});
