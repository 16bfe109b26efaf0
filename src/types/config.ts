/**
 * CLI configuration and options types
 */

export type CloudKind = 'aws' | 'azure';

/**
 * What happens when destination credentials cannot be established.
 * 'lenient' warns and carries on unauthenticated, 'strict' aborts.
 */
export type AuthMode = 'strict' | 'lenient';

export interface ReplicateOptions {
  from?: string;
  to?: string;
  images?: string;
  config?: string;
  cloud?: string;
  region?: string;
  awsProfile?: string;
  awsCredentialsFile?: string;
  sourceUsername?: string;
  sourcePassword?: string;
  strictAuth?: boolean;
  dryRun?: boolean;
  yes?: boolean;
  verbose?: boolean;
}

/**
 * Shape of a replicate.yaml job file
 */
export interface JobFileDefinition {
  source?: string;
  destination?: string;
  images?: string[];
  cloud?: string;
  region?: string;
  auth_mode?: string;
  source_username?: string;
  source_password?: string;
  aws_profile?: string;
  aws_credentials_file?: string;
}

export interface SourceCredentials {
  username: string;
  password: string;
}

/**
 * Immutable description of one replication run
 */
export interface ReplicationJob {
  readonly sourceRegistry: string;
  readonly destinationRegistry: string;
  readonly images: readonly string[];
  readonly cloud?: CloudKind;
  readonly region?: string;
  readonly verbose: boolean;
  readonly authMode: AuthMode;
  readonly sourceCredentials?: Readonly<SourceCredentials>;
  readonly awsProfile: string;
  readonly awsCredentialsFile?: string;
}

export const CLOUD_KINDS: readonly CloudKind[] = ['aws', 'azure'];
export const DEFAULT_AWS_PROFILE = 'default';
export const ECR_USERNAME = 'AWS';
export const ACR_TOKEN_USERNAME = '00000000-0000-0000-0000-000000000000';
export const DEFAULT_TAG = 'latest';
