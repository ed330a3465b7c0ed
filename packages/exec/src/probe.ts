/**
 * @wp-promote/exec - Tool availability
 */

import type { CommandRunner, ToolProbe } from '@wp-promote/shared';

export class PathToolProbe implements ToolProbe {
  constructor(private readonly runner: CommandRunner) {}

  async isAvailable(tool: string): Promise<boolean> {
    try {
      const result = await this.runner.exec('sh', ['-c', 'command -v "$1"', 'sh', tool]);
      return result.code === 0 && result.stdout.trim().length > 0;
    } catch {
      return false;
    }
  }
}
