/**
 * PreflightService Tests
 */

import { rm } from 'node:fs/promises';
import { join } from 'node:path';
import { FatalPreconditionError } from '@wp-promote/shared';
import {
  InMemorySite,
  RecordingLogger,
  StaticProbe,
  createWorkspace,
  exists,
  writeTree,
  type Workspace,
} from '../../../../test/support/index.js';
import { PreflightService } from '../preflight.service.js';

describe('PreflightService', () => {
  let ws: Workspace;
  let stage: InMemorySite;
  let prod: InMemorySite;

  function check(probe = new StaticProbe()): Promise<void> {
    return new PreflightService(ws.config({ BACKUP_DIR: join(ws.root, 'new-backups') }), {
      probe,
      stage: stage.asSite('stage'),
      prod: prod.asSite('production'),
      logger: new RecordingLogger(),
    }).check();
  }

  beforeEach(async () => {
    ws = await createWorkspace();
    stage = new InMemorySite(ws.stage);
    prod = new InMemorySite(ws.prod);
    await writeTree(ws.stage, { 'wp-config.php': '<?php' });
    await writeTree(ws.prod, { 'wp-config.php': '<?php' });
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  it('should pass and create the backup directory', async () => {
    await check();

    expect(await exists(join(ws.root, 'new-backups'))).toBe(true);
  });

  it('should list every missing tool', async () => {
    await expect(check(new StaticProbe(['tar']))).rejects.toThrow('Required tool(s) not found on PATH: wp, rsync');
  });

  it('should require both roots', async () => {
    await rm(ws.prod, { recursive: true });

    await expect(check()).rejects.toThrow(`production directory not found: ${ws.prod}`);
  });

  it('should require wp-config.php in both roots', async () => {
    await rm(join(ws.stage, 'wp-config.php'));

    await expect(check()).rejects.toThrow(`stage wp-config.php not found in ${ws.stage}`);
  });

  it('should require both databases to be reachable', async () => {
    prod.reachable = false;

    const checking = check();

    await expect(checking).rejects.toBeInstanceOf(FatalPreconditionError);
    await expect(checking).rejects.toThrow('Cannot connect to the production database');
  });
});
