/**
 * Replicate command implementation
 *
 * 1. Build and validate the job (flags over an optional job file)
 * 2. Show the plan, then stop for --dry-run or ask for confirmation
 * 3. Obtain destination credentials once
 * 4. Pull, tag and push every image in order
 */

import ora from 'ora';
import { buildReplicationJob, loadJobFile } from '../parsers/job.js';
import { Replicator, planReplication, type ReplicatorDeps } from '../replication/replicator.js';
import { ReplicatorError, describeError } from '../utils/errors.js';
import * as logger from '../utils/logger.js';
import { setVerbose } from '../utils/logger.js';
import { confirmReplication, showDryRun } from '../utils/prompts.js';
import { formatReference } from '../naming/index.js';
import type { ReplicateOptions } from '../types/config.js';
import type { ReplicationSummary } from '../types/registry.js';

export async function replicateCommand(options: ReplicateOptions): Promise<void> {
  if (options.verbose) {
    setVerbose(true);
  }

  try {
    await runReplication(options);
  } catch (error) {
    if (error instanceof ReplicatorError) {
      logger.error(error.message);
      process.exit(1);
    }

    logger.error(`Unexpected error: ${describeError(error)}`);
    if (logger.isVerbose() && error instanceof Error && error.stack) {
      console.error(error.stack);
    }
    process.exit(1);
  }
}

/**
 * Resolves with the summary of a completed run, or undefined when nothing
 * was replicated on purpose (dry run, declined prompt).
 */
export async function runReplication(
  options: ReplicateOptions,
  deps: ReplicatorDeps = {}
): Promise<ReplicationSummary | undefined> {
  const file = options.config ? await loadJobFile(options.config) : undefined;
  const job = buildReplicationJob(options, file);
  const plan = planReplication(job);

  setVerbose(job.verbose);
  logger.header('Registry Replicator');

  logger.info(`Images to replicate: ${job.images.length > 0 ? job.images.join(', ') : '(none)'}`);

  if (options.dryRun) {
    showDryRun(job, plan);
    return undefined;
  }

  if (plan.length > 0 && !options.yes && process.stdin.isTTY) {
    const confirmed = await confirmReplication(job, plan);
    if (!confirmed) {
      logger.info('Replication cancelled by user.');
      return undefined;
    }
  }

  const spinner = ora(`Authenticating against ${job.destinationRegistry}...`).start();
  let replicator: Replicator;
  try {
    replicator = await Replicator.create(job, deps);
  } catch (error) {
    spinner.fail('Could not obtain registry credentials');
    throw error;
  }

  if (replicator.destinationCredentials) {
    spinner.succeed(`Authenticated as ${replicator.destinationCredentials.username}`);
  } else {
    spinner.info('No cloud configured, pushing without registry login');
  }

  const summary = await replicator.run();

  logger.newline();
  logger.success(`Replicated ${summary.taggedImages.length} image(s) to ${job.destinationRegistry}`);
  for (const reference of summary.taggedImages) {
    logger.verbose(formatReference(reference));
  }

  return summary;
}
