/**
 * RestoreService Tests
 */

import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import type {
  BackupArchive,
  CacheCleaner,
  CacheFlusher,
  FileTransfer,
  PermissionNormalizer,
} from '@wp-promote/shared';
import {
  DirectoryArchiver,
  FsMirror,
  InMemorySite,
  RecordingLogger,
  createWorkspace,
  exists,
  writeTree,
  type Workspace,
} from '../../../../test/support/index.js';
import { BackupService } from '../backup.service.js';
import { RestoreService, type RestorePreview } from '../restore.service.js';

describe('RestoreService', () => {
  let ws: Workspace;
  let prod: InMemorySite;
  let archiver: DirectoryArchiver;
  let archive: BackupArchive;
  let permissionFailures: string[];
  let flushWarnings: string[];
  let transfer: FileTransfer;

  const permissions: PermissionNormalizer = {
    normalize: async () => ({ directories: 2, files: 3, failures: permissionFailures }),
  };
  const cache: CacheCleaner = {
    clear: async () => ({ removed: ['wp-content/cache'], failures: [] }),
  };
  const flusher: CacheFlusher = {
    flushCaches: async () => flushWarnings,
  };

  function service(): RestoreService {
    return new RestoreService(ws.config(), {
      prod,
      transfer,
      archiver,
      permissions,
      cache,
      flusher,
      logger: new RecordingLogger(),
      now: () => new Date(2024, 0, 6, 12, 0, 0),
    });
  }

  beforeEach(async () => {
    ws = await createWorkspace();
    prod = new InMemorySite(ws.prod).seedWordPress('example.com');
    archiver = new DirectoryArchiver(ws.store);
    permissionFailures = [];
    flushWarnings = [];
    transfer = new FsMirror();
    await writeTree(ws.prod, {
      'wp-config.php': '<?php // test-secret',
      'index.php': '<?php // original',
    });

    archive = await new BackupService(ws.config(), {
      prod,
      transfer: new FsMirror(),
      archiver,
      logger: new RecordingLogger(),
      now: () => new Date(2024, 0, 5, 9, 3, 7),
    }).create();

    // Production drifts after the backup
    await writeTree(ws.prod, {
      'wp-config.php': '<?php // live-secret',
      'index.php': '<?php // broken',
      'extra.php': '<?php // added later',
    });
    prod.tables.delete('wp_posts');
    prod.events.length = 0;
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  it('should restore files and database while keeping the live wp-config.php', async () => {
    const result = await service().restore(archive.filePath, async () => true);

    expect(result).toMatchObject({ success: true, archive: archive.filePath, warnings: [] });
    expect(await readFile(join(ws.prod, 'index.php'), 'utf-8')).toBe('<?php // original');
    expect(await exists(join(ws.prod, 'extra.php'))).toBe(false);
    expect(await readFile(join(ws.prod, 'wp-config.php'), 'utf-8')).toBe('<?php // live-secret');
    expect(prod.tables.has('wp_posts')).toBe(true);
    expect(prod.events).toEqual([`reset:${ws.prod}`, `import:${ws.prod}`]);
  });

  it('should keep a copy of the live wp-config.php in the backup directory', async () => {
    await service().restore(archive.filePath, async () => true);

    expect(await readFile(join(ws.backups, 'wp-config.php.pre-restore'), 'utf-8')).toBe('<?php // live-secret');
  });

  it('should show the archive metadata before overwriting', async () => {
    const previews: RestorePreview[] = [];
    await service().restore(archive.filePath, async preview => {
      previews.push(preview);
      return true;
    });

    expect(previews).toHaveLength(1);
    expect(previews[0]?.archive).toBe(archive.filePath);
    expect(previews[0]?.metadata?.prodURL).toBe('example.com');
  });

  it('should change nothing when the operator declines', async () => {
    const result = await service().restore(archive.filePath, async () => false);

    expect(result).toMatchObject({ success: false, cancelled: true });
    expect(await exists(join(ws.prod, 'extra.php'))).toBe(true);
    expect(prod.events).toEqual([]);
    expect(await exists(join(ws.backups, 'restore_temp_20240106120000'))).toBe(false);
  });

  it('should collect permission and flush warnings', async () => {
    permissionFailures = ['wp-content/uploads: EPERM'];
    flushWarnings = ['Could not flush object cache: cache-flush failed'];

    const result = await service().restore(archive.filePath, async () => true);

    expect(result.success).toBe(true);
    expect(result.warnings).toEqual([
      'Permission change failed: wp-content/uploads: EPERM',
      'Could not flush object cache: cache-flush failed',
    ]);
  });

  it('should fail when the archive cannot be extracted', async () => {
    const missing = join(ws.backups, 'prod_backup_20990101000000.tar.gz');

    const result = await service().restore(missing, async () => true);

    expect(result.success).toBe(false);
    expect(result.error).toBe(`Failed to extract ${missing}: tar: ${missing}: Cannot open`);
  });

  it('should put the live wp-config.php back when the file restore fails', async () => {
    transfer = {
      mirror: async (_source, destination) => {
        await rm(join(destination, 'wp-config.php'));
        throw new Error('rsync exited 23');
      },
    };

    const result = await service().restore(archive.filePath, async () => true);

    expect(result.success).toBe(false);
    expect(result.error).toBe('File restore failed: rsync exited 23');
    expect(await readFile(join(ws.prod, 'wp-config.php'), 'utf-8')).toBe('<?php // live-secret');
    expect(prod.events).toEqual([]);
  });

  it('should fail when the archive has no database dump', async () => {
    const incomplete = join(ws.backups, 'incomplete.tar.gz');
    const source = join(ws.root, 'incomplete');
    await writeTree(source, { 'files/index.php': '<?php' });
    await archiver.create(incomplete, source);

    const result = await service().restore(incomplete, async () => true);

    expect(result.error).toBe('Archive is missing database.sql');
  });

  it('should report a failed database import', async () => {
    prod.failImport = path => path.endsWith('database.sql');

    const result = await service().restore(archive.filePath, async () => true);

    expect(result.success).toBe(false);
    expect(result.error).toMatch(/^Database restore failed: import of .*database\.sql failed$/);
  });

  it('should restore without a live wp-config.php', async () => {
    await rm(join(ws.prod, 'wp-config.php'));

    const result = await service().restore(archive.filePath, async () => true);

    expect(result.success).toBe(true);
    expect(await exists(join(ws.prod, 'wp-config.php'))).toBe(false);
  });
});
