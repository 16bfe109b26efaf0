/**
 * Replication orchestrator
 *
 * Copies the job's images one at a time: pull from the source, tag for the
 * destination, push with the credentials obtained when the replicator was
 * created. The first failure ends the run.
 */

import { createCredentialProvider, type CredentialProvider } from '../auth/index.js';
import { RegistryClient } from '../docker/registry-client.js';
import { DockerRuntime, type ContainerRuntime } from '../docker/runtime.js';
import { deriveImageReference, getSourceReference } from '../naming/index.js';
import * as logger from '../utils/logger.js';
import type { ReplicationJob } from '../types/config.js';
import type {
  ImageReference,
  RegistryCredentials,
  ReplicationPlanEntry,
  ReplicationSummary,
} from '../types/registry.js';

export interface ReplicatorDeps {
  runtime?: ContainerRuntime;
  credentialProvider?: CredentialProvider;
}

export class Replicator {
  private readonly client: RegistryClient;

  private constructor(
    private readonly job: ReplicationJob,
    runtime: ContainerRuntime,
    private readonly credentials: Readonly<RegistryCredentials> | undefined
  ) {
    this.client = new RegistryClient(runtime, { cloud: job.cloud, authMode: job.authMode });
  }

  /**
   * Obtain destination credentials once and build a replicator around them
   */
  static async create(job: ReplicationJob, deps: ReplicatorDeps = {}): Promise<Replicator> {
    const provider = deps.credentialProvider ?? createCredentialProvider(job);

    logger.verbose(`Destination authentication: ${provider.kind}`);
    const credentials = await provider.getCredentials();

    return new Replicator(
      job,
      deps.runtime ?? new DockerRuntime(),
      credentials ? Object.freeze({ ...credentials }) : undefined
    );
  }

  get destinationCredentials(): Readonly<RegistryCredentials> | undefined {
    return this.credentials;
  }

  async run(): Promise<ReplicationSummary> {
    const { images, sourceRegistry, destinationRegistry, sourceCredentials } = this.job;
    const taggedImages: ImageReference[] = [];

    for (const [index, image] of images.entries()) {
      logger.step(index + 1, images.length, image);

      await this.client.pull(sourceRegistry, image, sourceCredentials);

      const tagged = await this.client.tag(image, sourceRegistry, destinationRegistry);
      if (!tagged.ok) {
        throw tagged.error;
      }
      taggedImages.push(tagged.value);

      await this.client.push(tagged.value, this.credentials);
    }

    return { taggedImages };
  }
}

/**
 * Where each image of the job would land, without touching the runtime
 */
export function planReplication(job: ReplicationJob): ReplicationPlanEntry[] {
  return job.images.map(image => ({
    image,
    source: getSourceReference(job.sourceRegistry, image),
    target: deriveImageReference(image, job.destinationRegistry, job.cloud),
  }));
}
