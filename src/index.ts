#!/usr/bin/env node

/**
 * Registry Replicator CLI
 *
 * Copy container images from one registry to another
 */

import { program } from 'commander';
import { replicateCommand } from './commands/replicate.js';

program
  .name('registry-replicator')
  .description('Copy container images between registries, with AWS ECR and Azure ACR login')
  .version('0.1.0');

program
  .command('replicate')
  .description('Pull images from the source registry, retag them and push them to the destination')
  .option('--from <url>', 'Source registry URL (e.g., https://registry.example.com)')
  .option('--to <registry>', 'Destination registry (e.g., 123456789012.dkr.ecr.us-east-1.amazonaws.com/mirror)')
  .option('--images <list>', 'Comma-separated list of images to replicate (e.g., app/api:v1,app/web:v2)')
  .option('--config <file>', 'YAML job file; command-line options take precedence over its values')
  .option('--cloud <kind>', 'Destination cloud for registry login: aws or azure (default: none)')
  .option('--region <region>', 'AWS region of the ECR registry (default: AWS_REGION)')
  .option('--aws-profile <name>', 'Profile to read from the AWS credentials file (default: default); ~/.aws/config is not read, but role_arn and credential_process entries in the profile are followed')
  .option('--aws-credentials-file <path>', 'AWS credentials file (default: ~/.aws/credentials)')
  .option('--source-username <name>', 'Username for the source registry')
  .option('--source-password <password>', 'Password for the source registry')
  .option(
    '--strict-auth',
    'Abort when destination credentials cannot be obtained instead of continuing without them'
  )
  .option('--dry-run', 'Show what would be replicated without pulling or pushing')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .option('--verbose', 'Enable verbose logging, including pull and push progress')
  .action(replicateCommand);

program.parse();
