/**
 * User prompts and confirmations
 */

import inquirer from 'inquirer';
import * as logger from './logger.js';
import { formatReference } from '../naming/index.js';
import type { ReplicationJob } from '../types/config.js';
import type { ReplicationPlanEntry } from '../types/registry.js';

export function showReplicationPlan(job: ReplicationJob, plan: ReplicationPlanEntry[]): void {
  console.log(`Source:      ${job.sourceRegistry}`);
  console.log(`Destination: ${job.destinationRegistry}`);
  console.log(`Cloud:       ${job.cloud ?? 'none (anonymous push)'}`);
  if (job.cloud === 'aws' && job.region) {
    console.log(`Region:      ${job.region}`);
  }
  logger.newline();

  if (plan.length === 0) {
    logger.info('No images to replicate.');
    return;
  }

  const tableRows: string[][] = [['#', 'Source Image', 'Target Image']];
  plan.forEach((entry, index) => {
    tableRows.push([String(index + 1), entry.source, formatReference(entry.target)]);
  });

  logger.table(tableRows);
  logger.newline();
}

export async function confirmReplication(job: ReplicationJob, plan: ReplicationPlanEntry[]): Promise<boolean> {
  logger.header('Replication Summary');
  showReplicationPlan(job, plan);

  const { proceed } = await inquirer.prompt<{ proceed: boolean }>([
    {
      type: 'confirm',
      name: 'proceed',
      message: `Replicate ${plan.length} image${plan.length !== 1 ? 's' : ''}?`,
      default: false,
    },
  ]);

  return proceed;
}

export function showDryRun(job: ReplicationJob, plan: ReplicationPlanEntry[]): void {
  logger.header('Replication - Dry Run');
  showReplicationPlan(job, plan);
  logger.info('Dry run complete. No images were pulled or pushed.');
}
