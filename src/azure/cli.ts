/**
 * Subprocess boundary for the Azure CLI
 */

import { execFile as execFileCallback } from 'node:child_process';
import { promisify } from 'node:util';
import * as logger from '../utils/logger.js';

const execFile = promisify(execFileCallback);

export const AZURE_CLI = 'az';

/**
 * Runs a command and resolves with its stdout. Rejects when the command
 * cannot be started or exits non-zero.
 */
export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export const runCommand: CommandRunner = async (command, args) => {
  logger.verbose(`Running: ${command} ${args.join(' ')}`);
  const { stdout, stderr } = await execFile(command, args, { encoding: 'utf-8' });

  if (stderr.trim()) {
    logger.verbose(stderr.trim());
  }

  return stdout;
};
