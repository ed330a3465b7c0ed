/**
 * backup_info.txt Tests
 */

import { formatBackupInfo, parseBackupInfo } from '../backup-info.js';

const metadata = {
  createdAt: '2024-01-05T09:03:07.000Z',
  prodPath: '/var/www/prod',
  stagePath: '/var/www/stage',
  prodURL: 'example.com',
  stageURL: 'stage.example.com',
  toolVersion: '1.0.0',
};

describe('backup info', () => {
  it('should write one labelled line per field', () => {
    expect(formatBackupInfo(metadata)).toBe(
      [
        'Backup Date: 2024-01-05T09:03:07.000Z',
        'Production Path: /var/www/prod',
        'Stage Path: /var/www/stage',
        'Production URL: example.com',
        'Stage URL: stage.example.com',
        'Tool Version: 1.0.0',
        '',
      ].join('\n'),
    );
  });

  it('should read what it writes', () => {
    expect(parseBackupInfo(formatBackupInfo(metadata))).toEqual(metadata);
  });

  it('should return null when a field is missing', () => {
    expect(parseBackupInfo('Backup Date: 2024-01-05\nProduction Path: /var/www/prod\n')).toBeNull();
  });
});
