/**
 * Registry and image types
 */

export interface RegistryCredentials {
  username: string;
  password: string;
  registryUrl: string;
}

export interface ImageReference {
  repository: string;
  tag: string;
}

/**
 * A planned copy of one source image to its destination reference
 */
export interface ReplicationPlanEntry {
  image: string;
  source: string;
  target: ImageReference;
}

export interface ReplicationSummary {
  taggedImages: ImageReference[];
}

/**
 * One decoded line of a Docker Engine progress stream
 */
export interface ProgressEvent {
  status?: string;
  progress?: string;
  id?: string;
  error?: string;
  errorDetail?: { message?: string };
}

export type Result<T, E extends Error = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E extends Error>(error: E): Result<never, E> {
  return { ok: false, error };
}
