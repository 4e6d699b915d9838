import { describe, it, expect } from '@jest/globals';
import type { CommandOutcome } from '@/lib/command-runner';
import {
  REQUIRED_BINARIES,
  checkBinary,
  checkClusterAccess,
  extractVersion,
  type BinaryRequirement,
} from '@/infra/health/checks';
import { ERROR_CODES } from '@/types';
import { createFakeRunner, silentLogger } from '../../../__support__/utilities/fakes';

function requirement(name: string): BinaryRequirement {
  const found = REQUIRED_BINARIES.find((candidate) => candidate.name === name);
  if (found === undefined) {
    throw new Error(`No requirement for ${name}`);
  }
  return found;
}

const runnerFor = (responses: Record<string, Partial<CommandOutcome>>) => createFakeRunner(responses);

describe('health checks', () => {
  it('should extract the first semantic version', () => {
    expect(extractVersion('Docker version 24.0.7, build afdd53b')).toBe('24.0.7');
    expect(extractVersion('v3.14.0+g3fc9f4b')).toBe('3.14.0');
    expect(extractVersion('unknown')).toBeUndefined();
  });

  describe('checkBinary', () => {
    it('should report the installed version', async () => {
      const runner = runnerFor({ 'helm version --short': { stdout: 'v3.14.0+g3fc9f4b\n' } });

      const result = await checkBinary(runner, requirement('helm'), silentLogger());

      expect(result).toEqual({ ok: true, value: { name: 'helm', version: '3.14.0' } });
    });

    it('should fail with DependencyMissing when the binary is absent', async () => {
      const runner = runnerFor({ 'kubectl version --client': { exitCode: null, notFound: true } });

      const result = await checkBinary(runner, requirement('kubectl'), silentLogger());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe('kubectl not found in PATH');
        expect(result.guidance?.code).toBe(ERROR_CODES.dependencyMissing);
        expect(result.guidance?.command).toBe('kubectl version --client');
      }
    });

    it('should fail when the version is below the minimum', async () => {
      const runner = runnerFor({ 'helm version --short': { stdout: 'v2.17.0+ga690bad\n' } });

      const result = await checkBinary(runner, requirement('helm'), silentLogger());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe('Incorrect helm version. Found 2.17.0, require >= 3.0.0');
        expect(result.guidance?.code).toBe(ERROR_CODES.dependencyMissing);
      }
    });

    it('should warn and continue when the version cannot be read', async () => {
      const runner = runnerFor({ 'kubectl version --client': { exitCode: 1, stderr: 'unknown flag' } });

      const result = await checkBinary(runner, requirement('kubectl'), silentLogger());

      expect(result).toEqual({
        ok: true,
        value: { name: 'kubectl', warning: 'Unable to verify kubectl version' },
      });
    });
  });

  describe('checkClusterAccess', () => {
    it('should pass when kubectl lists nodes', async () => {
      const result = await checkClusterAccess(runnerFor({ 'kubectl get nodes': {} }), silentLogger());

      expect(result).toEqual({ ok: true, value: undefined });
    });

    it('should fail with ClusterQueryError and the reason', async () => {
      const runner = runnerFor({
        'kubectl get nodes': { exitCode: 1, stderr: 'The connection to the server localhost:8080 was refused\n' },
      });

      const result = await checkClusterAccess(runner, silentLogger());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBe('Unable to reach the cluster: The connection to the server localhost:8080 was refused');
        expect(result.guidance?.code).toBe(ERROR_CODES.clusterQuery);
        expect(result.guidance?.command).toBe('kubectl get nodes');
      }
    });

    it('should report a timeout', async () => {
      const runner = runnerFor({ 'kubectl get nodes': { exitCode: null, timedOut: true } });

      const result = await checkClusterAccess(runner, silentLogger());

      expect(!result.ok && result.error).toBe('Unable to reach the cluster: timed out');
    });
  });
});
