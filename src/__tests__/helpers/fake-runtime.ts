import type { ContainerRuntime, RegistryAuth } from '../../docker/runtime.js';
import type { ReplicationJob } from '../../types/config.js';
import type { ImageReference, ProgressEvent, RegistryCredentials } from '../../types/registry.js';

/**
 * In-memory container runtime that records every call
 */
export class FakeRuntime implements ContainerRuntime {
  calls: string[] = [];
  logins: RegistryCredentials[] = [];
  pulls: { reference: string; auth?: RegistryAuth }[] = [];
  pushes: { target: ImageReference; auth?: RegistryAuth }[] = [];
  localImages = new Set<string>();
  pullEvents: ProgressEvent[] = [{ status: 'Download complete' }];
  pushEvents: ProgressEvent[] = [{ status: 'Pushed' }];
  keepPulledImages = true;
  tagFailure?: Error;

  async login(credentials: RegistryCredentials): Promise<void> {
    this.calls.push(`login ${credentials.registryUrl}`);
    this.logins.push(credentials);
  }

  async pull(reference: string, auth?: RegistryAuth): Promise<ProgressEvent[]> {
    this.calls.push(`pull ${reference}`);
    this.pulls.push({ reference, auth });
    if (this.keepPulledImages) {
      this.localImages.add(reference);
    }
    return this.pullEvents;
  }

  async imageExists(reference: string): Promise<boolean> {
    this.calls.push(`inspect ${reference}`);
    return this.localImages.has(reference);
  }

  async tag(reference: string, target: ImageReference): Promise<void> {
    this.calls.push(`tag ${reference} ${target.repository}:${target.tag}`);
    if (this.tagFailure) {
      throw this.tagFailure;
    }
  }

  async push(target: ImageReference, auth?: RegistryAuth): Promise<ProgressEvent[]> {
    this.calls.push(`push ${target.repository}:${target.tag}`);
    this.pushes.push({ target, auth });
    return this.pushEvents;
  }
}

export function makeJob(overrides: Partial<ReplicationJob> = {}): ReplicationJob {
  return {
    sourceRegistry: 'source.example.com',
    destinationRegistry: 'dest.example.com',
    images: [],
    verbose: false,
    authMode: 'lenient',
    awsProfile: 'default',
    ...overrides,
  };
}
