/**
 * SettingsService Tests
 */

import { InMemorySite, RecordingLogger, createWorkspace, type Workspace } from '../../../../test/support/index.js';
import { SettingsService } from '../settings.service.js';

describe('SettingsService', () => {
  let ws: Workspace;
  let prod: InMemorySite;
  let logger: RecordingLogger;
  const sleep = jest.fn(async (_ms: number) => {});

  function service(overrides: Record<string, string> = {}): SettingsService {
    return new SettingsService(ws.config(overrides), {
      prod: prod.asSite('production'),
      logger,
      retry: { attempts: 3, delayMs: 0, sleep },
    });
  }

  beforeEach(async () => {
    ws = await createWorkspace();
    prod = new InMemorySite(ws.prod).seedWordPress('example.com');
    logger = new RecordingLogger();
    sleep.mockClear();
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  describe('normalize', () => {
    it('should enable indexing and run the cleanup operations', async () => {
      const warnings = await service().normalize();

      expect(warnings).toEqual([]);
      expect(await prod.getOption('blog_public')).toBe('1');
      expect(prod.events).toEqual(['transients', 'maintenance-off', 'rewrite-flush']);
    });

    it('should apply the configured timezone and admin e-mail', async () => {
      await service({ PROD_TIMEZONE: 'Europe/Berlin', PROD_ADMIN_EMAIL: 'admin@example.com' }).normalize();

      expect(await prod.getOption('timezone_string')).toBe('Europe/Berlin');
      expect(await prod.getOption('admin_email')).toBe('admin@example.com');
    });

    it('should leave timezone and admin e-mail alone when unset', async () => {
      await service().normalize();

      expect(await prod.getOption('timezone_string')).toBeNull();
    });

    it('should fall back to wp option update when the direct write fails', async () => {
      prod.failNext('set:blog_public');

      const warnings = await service().normalize();

      expect(warnings).toEqual([]);
      expect(await prod.getOption('blog_public')).toBe('1');
      expect(logger.entries).toContainEqual({
        level: 'info',
        message: 'Search engine indexing enabled',
        meta: { via: 'wp option update' },
      });
    });

    it('should create a missing blog_public row through the fallback', async () => {
      const options = prod.tables.get('wp_options');
      if (options) options.rows = options.rows.filter(row => row.option_name !== 'blog_public');

      await service().normalize();

      expect(await prod.getOption('blog_public')).toBe('1');
    });

    it('should warn when both writes fail', async () => {
      prod.failNext('set:blog_public');
      prod.failNext('option-update');

      const warnings = await service().normalize();

      expect(warnings).toEqual([
        'Could not enable search engine indexing: set:blog_public failed; fallback: option-update failed',
      ]);
    });

    it('should turn cleanup failures into warnings', async () => {
      prod.failNext('maintenance');

      const warnings = await service().normalize();

      expect(warnings).toEqual(['Could not deactivate maintenance mode: maintenance failed']);
      expect(prod.events).toEqual(['transients', 'rewrite-flush']);
    });

    it('should be idempotent', async () => {
      await service().normalize();
      const options = JSON.stringify(prod.rows('wp_options'));

      await service().normalize();

      expect(JSON.stringify(prod.rows('wp_options'))).toBe(options);
    });
  });

  describe('flushCaches', () => {
    it('should run every flush once when all succeed', async () => {
      const warnings = await service().flushCaches();

      expect(warnings).toEqual([]);
      expect(prod.events).toEqual(['rewrite-flush', 'cache-flush', 'update-db', 'transients']);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('should retry a transient failure without warning', async () => {
      prod.failNext('cache-flush', 2);

      const warnings = await service().flushCaches();

      expect(warnings).toEqual([]);
      expect(sleep).toHaveBeenCalledTimes(2);
      expect(logger.messages('debug')).toEqual(['Retrying: flush object cache', 'Retrying: flush object cache']);
    });

    it('should delete the rewrite_rules row when flushing keeps failing', async () => {
      prod.rows('wp_options').push({ option_id: '4', option_name: 'rewrite_rules', option_value: 'a:0:{}' });
      prod.failNext('rewrite-flush', 3);

      const warnings = await service().flushCaches();

      expect(warnings).toEqual(['flush rewrite rules used fallback after 3 failed attempt(s): rewrite-flush failed']);
      expect(await prod.getOption('rewrite_rules')).toBeNull();
    });

    it('should report an operation that never succeeds', async () => {
      prod.failNext('update-db', 3);

      const warnings = await service().flushCaches();

      expect(warnings).toEqual(['Could not update core database: update-db failed']);
      expect(prod.events).toContain('transients');
    });
  });
});
