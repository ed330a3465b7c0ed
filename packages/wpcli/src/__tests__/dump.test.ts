/**
 * SQL Dump Helper Tests
 */

import { extractInsertStatements } from '../dump.js';

describe('extractInsertStatements', () => {
  it('should keep only insert statements, including multi-line ones', () => {
    const dump = [
      '-- MySQL dump',
      'DROP TABLE IF EXISTS `wp_leads`;',
      'CREATE TABLE `wp_leads` (',
      '  `id` int',
      ');',
      "INSERT INTO `wp_leads` VALUES (1,'a'),",
      "(2,'b');",
      'UNLOCK TABLES;',
      "INSERT INTO `wp_leads` VALUES (3,'c');",
    ].join('\n');

    expect(extractInsertStatements(dump)).toBe(
      "INSERT INTO `wp_leads` VALUES (1,'a'),\n(2,'b');\nINSERT INTO `wp_leads` VALUES (3,'c');",
    );
  });

  it('should return an empty string when there is no data', () => {
    expect(extractInsertStatements('CREATE TABLE `wp_leads` (`id` int);\n')).toBe('');
  });
});
