/**
 * tar Archiver Tests
 */

import { ScriptedRunner } from '../../../../test/support/index.js';
import { Tar } from '../tar.js';

describe('Tar', () => {
  it('should create a gzip archive of the directory contents', async () => {
    const runner = new ScriptedRunner();
    await new Tar(runner).create('/backups/backup_20240105090307.tar.gz', '/backups/temp_20240105090307');

    expect(runner.calls[0]?.args).toEqual([
      '-czf',
      '/backups/backup_20240105090307.tar.gz',
      '-C',
      '/backups/temp_20240105090307',
      '.',
    ]);
  });

  it('should extract into the destination', async () => {
    const runner = new ScriptedRunner();
    await new Tar(runner).extract('/backups/a.tar.gz', '/tmp/restore');

    expect(runner.calls[0]?.args).toEqual(['-xzf', '/backups/a.tar.gz', '-C', '/tmp/restore']);
  });

  it('should list entries without the leading ./', async () => {
    const runner = new ScriptedRunner().respond((file, args) =>
      file === 'tar' && args[0] === '-tzf' ? { stdout: './\n./files/\n./files/index.php\n./database.sql\n' } : undefined,
    );

    expect(await new Tar(runner).list('/backups/a.tar.gz')).toEqual(['files/', 'files/index.php', 'database.sql']);
  });
});
