import { describe, it, expect, vi, beforeEach } from 'vitest';
import { runReplication } from '../commands/replicate.js';
import { NoCredentialProvider, type CredentialProvider } from '../auth/index.js';
import { InvalidRegistryUrlError } from '../utils/errors.js';
import { FakeRuntime } from './helpers/fake-runtime.js';

vi.mock('../utils/logger.js', () => ({
  setVerbose: vi.fn(),
  isVerbose: vi.fn(() => false),
  verbose: vi.fn(),
  info: vi.fn(),
  success: vi.fn(),
  step: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  header: vi.fn(),
  table: vi.fn(),
  newline: vi.fn(),
}));

vi.mock('ora', () => {
  const spinner = {
    start: vi.fn(),
    succeed: vi.fn(),
    fail: vi.fn(),
    info: vi.fn(),
  };
  spinner.start.mockReturnValue(spinner);
  return { default: vi.fn(() => spinner) };
});

describe('runReplication', () => {
  let runtime: FakeRuntime;
  let getCredentials: ReturnType<typeof vi.fn>;
  let provider: CredentialProvider;

  beforeEach(() => {
    runtime = new FakeRuntime();
    getCredentials = vi.fn().mockResolvedValue(undefined);
    provider = { kind: 'azure', getCredentials };
  });

  it('should stop before any credential setup when the source URL is invalid', async () => {
    await expect(
      runReplication(
        { from: 'registry.example.com', to: 'myacr.azurecr.io', images: 'app:v1', cloud: 'azure', yes: true },
        { runtime, credentialProvider: provider }
      )
    ).rejects.toThrow(InvalidRegistryUrlError);

    expect(getCredentials).not.toHaveBeenCalled();
    expect(runtime.calls).toEqual([]);
  });

  it('should replicate every image end to end', async () => {
    const summary = await runReplication(
      { from: 'https://source.example.com', to: 'dest.example.com', images: 'app/api:v1', yes: true },
      { runtime, credentialProvider: new NoCredentialProvider() }
    );

    expect(summary).toEqual({ taggedImages: [{ repository: 'dest.example.com/app/api:v1', tag: 'latest' }] });
    expect(runtime.calls).toEqual([
      'pull source.example.com/app/api:v1',
      'inspect source.example.com/app/api:v1',
      'tag source.example.com/app/api:v1 dest.example.com/app/api:v1:latest',
      'push dest.example.com/app/api:v1:latest',
    ]);
  });

  it('should not touch credentials or the runtime on a dry run', async () => {
    const summary = await runReplication(
      {
        from: 'https://source.example.com',
        to: 'myacr.azurecr.io',
        images: 'app/api:v1',
        cloud: 'azure',
        dryRun: true,
      },
      { runtime, credentialProvider: provider }
    );

    expect(summary).toBeUndefined();
    expect(getCredentials).not.toHaveBeenCalled();
    expect(runtime.calls).toEqual([]);
  });

  it('should complete an empty run without runtime calls', async () => {
    const summary = await runReplication(
      { from: 'https://source.example.com', to: 'myacr.azurecr.io', images: '', cloud: 'azure' },
      { runtime, credentialProvider: provider }
    );

    expect(summary).toEqual({ taggedImages: [] });
    expect(getCredentials).toHaveBeenCalledTimes(1);
    expect(runtime.calls).toEqual([]);
  });

  it('should surface credential failures', async () => {
    getCredentials.mockRejectedValue(new Error('az: command not found'));

    await expect(
      runReplication(
        { from: 'https://source.example.com', to: 'myacr.azurecr.io', images: 'app:v1', cloud: 'azure', yes: true },
        { runtime, credentialProvider: provider }
      )
    ).rejects.toThrow('az: command not found');
    expect(runtime.calls).toEqual([]);
  });
});
