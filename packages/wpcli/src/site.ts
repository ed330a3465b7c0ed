/**
 * @wp-promote/wpcli - Site factory
 */

import type { CommandRunner, DeploymentConfig, Site } from '@wp-promote/shared';
import { WpCli } from './client.js';
import { SqlSiteRepo } from './repos/site.repo.js';

export function createSite(
  name: Site['name'],
  config: DeploymentConfig,
  runner: CommandRunner,
): Site {
  const root = name === 'stage' ? config.stagePath : config.prodPath;
  const db = new WpCli(root, runner, { allowRoot: config.allowRoot });
  return { name, root, db, repo: new SqlSiteRepo(db, config.tablePrefix) };
}
