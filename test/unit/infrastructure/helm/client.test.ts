import { describe, it, expect } from '@jest/globals';
import type { CommandOutcome } from '@/lib/command-runner';
import { createHelmClient } from '@/infra/helm/client';
import { createFakeRunner, silentLogger } from '../../../__support__/utilities/fakes';

const STATUS = 'helm status falcon-sensor -n falcon-system';
const VALUES = 'helm get values falcon-sensor -n falcon-system -o json';

function helmAnswering(responses: Record<string, Partial<CommandOutcome>>) {
  const runner = createFakeRunner(responses);
  return { runner, helm: createHelmClient({ runner, logger: silentLogger(), timeoutMs: 1000 }) };
}

describe('HelmClient', () => {
  describe('detectClusterState', () => {
    it('should report an installed release', async () => {
      const { helm, runner } = helmAnswering({ [STATUS]: { stdout: 'STATUS: deployed' } });

      expect(await helm.detectClusterState('falcon-sensor', 'falcon-system')).toEqual({ kind: 'Present' });
      expect(runner.calls).toEqual([STATUS]);
    });

    it('should report a missing release only for helm not-found errors', async () => {
      const { helm } = helmAnswering({ [STATUS]: { exitCode: 1, stderr: 'Error: release: not found\n' } });

      expect(await helm.detectClusterState('falcon-sensor', 'falcon-system')).toEqual({ kind: 'NotPresent' });
    });

    it('should report Unknown when the cluster cannot be queried', async () => {
      const { helm } = helmAnswering({
        [STATUS]: { exitCode: 1, stderr: 'Error: Kubernetes cluster unreachable\n' },
      });

      expect(await helm.detectClusterState('falcon-sensor', 'falcon-system')).toEqual({
        kind: 'Unknown',
        query: STATUS,
        reason: 'Error: Kubernetes cluster unreachable',
      });
    });

    it('should report Unknown when helm is missing', async () => {
      const { helm } = helmAnswering({ [STATUS]: { exitCode: null, notFound: true, stderr: 'spawn helm ENOENT' } });

      expect(await helm.detectClusterState('falcon-sensor', 'falcon-system')).toEqual({
        kind: 'Unknown',
        query: STATUS,
        reason: 'helm is not on PATH',
      });
    });

    it('should report Unknown on timeout', async () => {
      const { helm } = helmAnswering({ [STATUS]: { exitCode: null, timedOut: true } });

      const state = await helm.detectClusterState('falcon-sensor', 'falcon-system');

      expect(state).toEqual({ kind: 'Unknown', query: STATUS, reason: 'timed out after 1000ms' });
    });

    it('should fall back to the exit code when stderr is empty', async () => {
      const { helm } = helmAnswering({ [STATUS]: { exitCode: 2 } });

      const state = await helm.detectClusterState('falcon-sensor', 'falcon-system');

      expect(state).toEqual({ kind: 'Unknown', query: STATUS, reason: 'exit code 2' });
    });
  });

  describe('getInstalledImageTag', () => {
    it('should read the node image tag from the release values', async () => {
      const { helm } = helmAnswering({
        [VALUES]: { stdout: JSON.stringify({ node: { image: { repository: 'localhost:5000/falcon-sensor', tag: '7.17.0-16903' } } }) },
      });

      expect(await helm.getInstalledImageTag('falcon-sensor', 'falcon-system', ['node', 'image', 'tag'])).toBe(
        '7.17.0-16903',
      );
    });

    it('should follow the tag path of the component chart', async () => {
      const { helm } = helmAnswering({
        [VALUES]: { stdout: JSON.stringify({ image: { tag: '7.20.0-1201' }, clusterName: 'test-cluster' }) },
      });

      expect(await helm.getInstalledImageTag('falcon-sensor', 'falcon-system', ['image', 'tag'])).toBe('7.20.0-1201');
      expect(await helm.getInstalledImageTag('falcon-sensor', 'falcon-system', ['node', 'image', 'tag'])).toBeUndefined();
      expect(await helm.getInstalledImageTag('falcon-sensor', 'falcon-system', ['clusterName', 'tag'])).toBeUndefined();
    });

    it('should return undefined when the values cannot be read', async () => {
      const failing = helmAnswering({ [VALUES]: { exitCode: 1, stderr: 'Error: release: not found' } });
      const garbled = helmAnswering({ [VALUES]: { stdout: 'node: {' } });

      expect(await failing.helm.getInstalledImageTag('falcon-sensor', 'falcon-system', ['image', 'tag'])).toBeUndefined();
      expect(await garbled.helm.getInstalledImageTag('falcon-sensor', 'falcon-system', ['image', 'tag'])).toBeUndefined();
    });
  });
});
