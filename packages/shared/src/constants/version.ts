/**
 * @wp-promote/shared - Version
 * Written into backup_info.txt so archives record which tool produced them.
 */

export const VERSION = '1.0.0';
