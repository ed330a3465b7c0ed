/**
 * SyncService Tests
 */

import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import {
  FatalPreconditionError,
  FatalStageError,
  type FileTransfer,
  type PermissionNormalizer,
} from '@wp-promote/shared';
import {
  FsMirror,
  RecordingLogger,
  createWorkspace,
  exists,
  writeTree,
  type Workspace,
} from '../../../../test/support/index.js';
import { SyncService } from '../sync.service.js';

describe('SyncService', () => {
  let ws: Workspace;
  let mirror: FsMirror;
  let permissionFailures: string[];

  const permissions: PermissionNormalizer = {
    normalize: async () => ({ directories: 1, files: 1, failures: permissionFailures }),
  };

  function service(transfer: FileTransfer = mirror): SyncService {
    return new SyncService(ws.config(), { transfer, permissions, logger: new RecordingLogger() });
  }

  beforeEach(async () => {
    ws = await createWorkspace();
    mirror = new FsMirror();
    permissionFailures = [];
    await writeTree(ws.stage, {
      'wp-config.php': '<?php // stage-secret',
      'index.php': '<?php // stage',
      '.git/HEAD': 'ref: refs/heads/main',
      'wp-content/cache/page.html': 'stage cache',
      'wp-content/uploads/photo.jpg': 'jpg',
    });
    await writeTree(ws.prod, {
      'wp-config.php': '<?php // prod-secret',
      'index.php': '<?php // prod',
      'old.php': '<?php // removed from stage',
      'wp-content/cache/keep.html': 'prod cache',
    });
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  it('should mirror staging onto production with deletes', async () => {
    await service().sync();

    expect(await readFile(join(ws.prod, 'index.php'), 'utf-8')).toBe('<?php // stage');
    expect(await exists(join(ws.prod, 'wp-content/uploads/photo.jpg'))).toBe(true);
    expect(await exists(join(ws.prod, 'old.php'))).toBe(false);
  });

  it('should keep the production wp-config.php', async () => {
    await service().sync();

    expect(await readFile(join(ws.prod, 'wp-config.php'), 'utf-8')).toBe('<?php // prod-secret');
    expect(await readFile(join(ws.backups, 'wp-config.php.backup'), 'utf-8')).toBe('<?php // prod-secret');
  });

  it('should not copy denylisted paths', async () => {
    await service().sync();

    expect(await exists(join(ws.prod, '.git'))).toBe(false);
    expect(await exists(join(ws.prod, 'wp-content/cache/page.html'))).toBe(false);
  });

  it('should mirror with checksum comparison and the denylist', async () => {
    await service().sync();

    expect(mirror.calls).toHaveLength(1);
    expect(mirror.calls[0]?.source).toBe(ws.stage);
    expect(mirror.calls[0]?.destination).toBe(ws.prod);
    expect(mirror.calls[0]?.options).toMatchObject({ delete: true, checksum: true });
    expect(mirror.calls[0]?.options.exclude).toEqual(expect.arrayContaining(['/wp-config.php', '.git/']));
  });

  it('should refuse to run without a production wp-config.php', async () => {
    await rm(join(ws.prod, 'wp-config.php'));

    await expect(service().sync()).rejects.toBeInstanceOf(FatalPreconditionError);
    expect(mirror.calls).toEqual([]);
  });

  it('should put wp-config.php back when the mirror fails', async () => {
    const failing: FileTransfer = {
      mirror: async (_source, destination) => {
        await rm(join(destination, 'wp-config.php'));
        throw new Error('rsync exited with code 23');
      },
    };

    const syncing = service(failing).sync();

    await expect(syncing).rejects.toBeInstanceOf(FatalStageError);
    await expect(syncing).rejects.toThrow('File sync failed: rsync exited with code 23');
    expect(await readFile(join(ws.prod, 'wp-config.php'), 'utf-8')).toBe('<?php // prod-secret');
  });

  it('should turn permission failures into warnings', async () => {
    permissionFailures = ['wp-content/uploads: EPERM'];

    const result = await service().sync();

    expect(result.warnings).toEqual(['Permission change failed: wp-content/uploads: EPERM']);
  });
});
