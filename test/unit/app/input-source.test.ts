import { describe, it, expect } from '@jest/globals';
import { collectOverrides, createNonInteractiveInput } from '@/app/input-source';
import { ERROR_CODES } from '@/types';

describe('collectOverrides', () => {
  it('should read trimmed FALCON_* variables and ignore empty ones', () => {
    const overrides = collectOverrides({
      FALCON_CID: ' 0123456789ABCDEF0123456789ABCDEF-12 ',
      FALCON_CLIENT_ID: 'test-client',
      FALCON_CLIENT_SECRET: '   ',
      FALCON_IMAGE_TAG: '',
      FALCON_LOCAL_REGISTRY: 'registry.internal:5000',
      UNRELATED: 'ignored',
    });

    expect(overrides).toEqual({
      cid: '0123456789ABCDEF0123456789ABCDEF-12',
      clientId: 'test-client',
      localRegistry: 'registry.internal:5000',
    });
  });

  it('should let flags win over the environment', () => {
    const overrides = collectOverrides(
      { FALCON_CLOUD_REGION: 'us-1' },
      { region: 'eu-1', namespace: 'sensors', backend: 'kernel' },
    );

    expect(overrides).toEqual({ region: 'eu-1', namespace: 'sensors', backend: 'kernel' });
  });

  it('should collect component answers from FALCON_CLUSTER_NAME and flags', () => {
    const fromEnv = collectOverrides({ FALCON_CLUSTER_NAME: 'test-cluster' });
    const fromFlags = collectOverrides(
      { FALCON_CLUSTER_NAME: 'test-cluster' },
      { clusterName: 'flag-cluster', iarMode: 'socket', iarRuntime: 'crio' },
    );

    expect(fromEnv).toEqual({ clusterName: 'test-cluster' });
    expect(fromFlags).toEqual({ clusterName: 'flag-cluster', iarMode: 'socket', iarRuntime: 'crio' });
  });
});

describe('non-interactive input', () => {
  const input = createNonInteractiveInput();

  it('should answer text questions with their default', async () => {
    expect(await input.text({ name: 'namespace', message: 'Namespace', default: 'falcon-system' })).toEqual({
      ok: true,
      value: 'falcon-system',
    });
  });

  it('should fail a question without a default and name the override', async () => {
    const result = await input.text({ name: 'client secret', message: 'Secret', source: 'FALCON_CLIENT_SECRET' });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe('No value for client secret in non-interactive mode');
      expect(result.guidance?.resolution).toBe('Provide it with FALCON_CLIENT_SECRET');
      expect(result.guidance?.code).toBe(ERROR_CODES.userInput);
    }
  });

  it('should validate defaults', async () => {
    const result = await input.text({
      name: 'namespace',
      message: 'Namespace',
      default: 'Not_Valid',
      validate: () => 'Namespace must contain only lowercase letters, numbers, and hyphens',
    });

    expect(!result.ok && result.error).toBe(
      'Invalid namespace: Namespace must contain only lowercase letters, numbers, and hyphens',
    );
  });

  it('should answer selections with their default', async () => {
    expect(
      await input.select({ name: 'sensor backend', message: 'Backend', choices: ['bpf', 'kernel'], default: 'kernel' }),
    ).toEqual({ ok: true, value: 'kernel' });
  });

  it('should take confirmation defaults unless told to assume yes', async () => {
    const question = { message: 'Remove the saved configuration file?', default: false };

    expect(await input.confirm(question)).toEqual({ ok: true, value: false });
    expect(await createNonInteractiveInput({ assumeYes: true }).confirm(question)).toEqual({ ok: true, value: true });
  });
});
