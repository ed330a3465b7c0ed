/**
 * Site Repository Tests
 */

import { OPTIONS_TARGET, REWRITE_TARGETS, parseConfig } from '@wp-promote/shared';
import { ScriptedRunner } from '../../../../test/support/index.js';
import { WpCli } from '../client.js';
import { SqlSiteRepo } from '../repos/site.repo.js';
import { createSite } from '../site.js';

function repoWith(runner: ScriptedRunner, prefix = 'wp_'): SqlSiteRepo {
  return new SqlSiteRepo(new WpCli('/var/www/prod', runner), prefix);
}

function sqlOf(runner: ScriptedRunner, index = 0): string | undefined {
  return runner.calls[index]?.args[2];
}

describe('SqlSiteRepo', () => {
  it('should list tables', async () => {
    const runner = new ScriptedRunner().respond(() => ({ stdout: 'wp_options\nwp_posts\n' }));

    expect(await repoWith(runner).listTables()).toEqual(['wp_options', 'wp_posts']);
    expect(sqlOf(runner)).toBe('SHOW TABLES;');
  });

  it('should check table existence with an escaped LIKE', async () => {
    const runner = new ScriptedRunner().respond(() => ({ stdout: 'wp_leads\n' }));

    expect(await repoWith(runner).tableExists('wp_leads')).toBe(true);
    expect(sqlOf(runner)).toBe("SHOW TABLES LIKE 'wp\\\\_leads';");
  });

  it('should drop with foreign key checks disabled in the same batch', async () => {
    const runner = new ScriptedRunner();
    await repoWith(runner).dropTable('wp_posts');

    expect(sqlOf(runner)).toBe('SET FOREIGN_KEY_CHECKS = 0; DROP TABLE IF EXISTS `wp_posts`; SET FOREIGN_KEY_CHECKS = 1;');
  });

  it('should refuse unsafe table names', async () => {
    await expect(repoWith(new ScriptedRunner()).dropTable('wp_posts; --')).rejects.toThrow(
      'Invalid SQL identifier: wp_posts; --',
    );
  });

  it('should count matches in a prefixed target', async () => {
    const runner = new ScriptedRunner().respond(() => ({ stdout: '4\n' }));

    expect(await repoWith(runner, 'site_').countMatches(REWRITE_TARGETS[1], 'stage.example.com')).toBe(4);
    expect(sqlOf(runner)).toBe("SELECT COUNT(*) FROM `site_posts` WHERE `post_content` LIKE '%stage.example.com%';");
  });

  it('should build scoped and unscoped replacements', async () => {
    const runner = new ScriptedRunner().respond(() => ({ stdout: 'Success: Query succeeded. Rows affected: 3\n' }));
    const repo = repoWith(runner);

    expect(await repo.replaceInTarget(OPTIONS_TARGET, 'http://a.test', 'https://b.test')).toBe(3);
    await repo.replaceInTarget(OPTIONS_TARGET, 'a.test', 'b.test', { scoped: false });

    expect(sqlOf(runner, 0)).toBe(
      "UPDATE `wp_options` SET `option_value` = REPLACE(`option_value`, 'http://a.test', 'https://b.test') WHERE `option_value` LIKE '%http://a.test%';",
    );
    expect(sqlOf(runner, 1)).toBe("UPDATE `wp_options` SET `option_value` = REPLACE(`option_value`, 'a.test', 'b.test');");
  });

  it('should read and write options', async () => {
    const runner = new ScriptedRunner().respond((_file, args) =>
      args[2]?.startsWith('SELECT') ? { stdout: 'https://example.com\n' } : { stdout: 'Rows affected: 1' },
    );
    const repo = repoWith(runner);

    expect(await repo.getOption('siteurl')).toBe('https://example.com');
    expect(await repo.setOptionValue('blog_public', '1')).toBe(1);
    expect(sqlOf(runner, 1)).toBe("UPDATE `wp_options` SET option_value = '1' WHERE option_name = 'blog_public';");
  });

  it('should return null for a missing option', async () => {
    expect(await repoWith(new ScriptedRunner()).getOption('missing')).toBeNull();
  });

  it('should delete options by LIKE patterns', async () => {
    const runner = new ScriptedRunner();
    const repo = repoWith(runner);

    expect(await repo.deleteOptionsLike([])).toBe(0);
    await repo.deleteOptionsLike(['bricks_css_%', 'bricks_js_%']);

    expect(runner.calls).toHaveLength(1);
    expect(sqlOf(runner)).toBe(
      "DELETE FROM `wp_options` WHERE option_name LIKE 'bricks_css_%' OR option_name LIKE 'bricks_js_%';",
    );
  });

  it('should decode serialized values selected as hex', async () => {
    const value = 'a:1:{s:3:"url";s:25:"https://stage.example.com";}';
    const runner = new ScriptedRunner().respond((_file, args) =>
      args[2]?.includes('`wp_options`') ? { stdout: `${Buffer.from(value).toString('hex').toUpperCase()}\n` } : undefined,
    );

    expect(await repoWith(runner).findSerializedValues('stage.example.com', 5)).toEqual([value]);
    expect(sqlOf(runner, 0)).toContain('LIMIT 5;');
    expect(sqlOf(runner, 1)).toContain('LIMIT 4;');
  });

  it('should sum serialized matches across options and post meta', async () => {
    const runner = new ScriptedRunner().respond(() => ({ stdout: '2\n' }));

    expect(await repoWith(runner).countSerializedMatches('stage.example.com')).toBe(4);
    expect(sqlOf(runner)).toBe(
      "SELECT COUNT(*) FROM `wp_options` WHERE (`option_value` LIKE 'a:%' OR `option_value` LIKE 's:%' OR `option_value` LIKE 'O:%') AND `option_value` LIKE '%stage.example.com%';",
    );
  });
});

describe('createSite', () => {
  it('should bind the data layer to the environment root', () => {
    const config = parseConfig({
      STAGE_PATH: '/var/www/stage',
      STAGE_URL: 'stage.example.com',
      PROD_PATH: '/var/www/prod',
      PROD_URL: 'example.com',
      BACKUP_DIR: '/var/backups/wp',
    });

    const site = createSite('stage', config, new ScriptedRunner());

    expect(site.name).toBe('stage');
    expect(site.root).toBe('/var/www/stage');
    expect(site.db.root).toBe('/var/www/stage');
    expect(site.repo).toBeInstanceOf(SqlSiteRepo);
  });
});
