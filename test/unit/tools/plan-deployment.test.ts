import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { existsSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import yaml from 'js-yaml';
import { planDeploymentTool } from '@/tools';
import { ERROR_CODES, type ClusterState } from '@/types';
import { TEST_CID, createFakeServices, createTestContext } from '../../__support__/utilities/fakes';
import { createTestTempDir } from '../../__support__/utilities/tmp-helpers';

const image = { repository: 'localhost:5000/falcon-sensor', tag: '7.18.0-17106' };

describe('plan-deployment tool', () => {
  let valuesFile: string;
  let cleanup: () => Promise<void>;

  beforeEach(() => {
    const temp = createTestTempDir('plan-');
    cleanup = temp.cleanup;
    valuesFile = join(temp.dir.name, 'falcon-sensor-values.yaml');
  });

  afterEach(async () => {
    await cleanup();
  });

  async function plan(
    action: 'install' | 'upgrade' | 'uninstall',
    clusterState: ClusterState,
    extra: { installedTag?: string; removeNamespace?: boolean; withImage?: boolean } = {},
  ) {
    const fakes = createFakeServices({
      clusterState,
      ...(extra.installedTag !== undefined && { installedTag: extra.installedTag }),
    });
    const input = planDeploymentTool.parse({
      action,
      component: 'sensor',
      namespace: 'falcon-system',
      valuesFile,
      ...(action !== 'uninstall' &&
        extra.withImage !== false && {
          cid: TEST_CID,
          settings: { component: 'sensor', backend: 'bpf' },
          image,
          registryConfigJSON: 'e30=',
        }),
      ...(extra.removeNamespace !== undefined && { removeNamespace: extra.removeNamespace }),
    });
    const result = await planDeploymentTool.handler(input, createTestContext(fakes.services));
    return { result, fakes };
  }

  it('should plan an install and write the values file', async () => {
    const { result } = await plan('install', { kind: 'NotPresent' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.action).toBe('install');
    expect(result.value.summary).toBe("🚀 Install plan for 'falcon-sensor' in 'falcon-system'");
    expect(result.value.warnings).toEqual([]);
    expect(result.value.valuesFile).toBe(valuesFile);
    expect(result.value.commands.map((command) => command.argv.slice(0, 2).join(' '))).toEqual([
      'helm repo',
      'helm repo',
      'kubectl create',
      'kubectl label',
      'kubectl label',
      'kubectl label',
      'helm install',
      'kubectl rollout',
      'kubectl logs',
    ]);
    expect(yaml.load(readFileSync(valuesFile, 'utf-8'))).toEqual({
      falcon: { cid: TEST_CID },
      node: {
        enabled: true,
        image: { ...image, pullPolicy: 'Always', registryConfigJSON: 'e30=' },
        backend: 'bpf',
      },
    });
    expect(statSync(valuesFile).mode & 0o777).toBe(0o600);
  });

  it('should turn an install over an existing release into an upgrade', async () => {
    const { result, fakes } = await plan('install', { kind: 'Present' }, { installedTag: '7.17.0-16903' });

    expect(fakes.helm.queries).toEqual([
      'status falcon-sensor falcon-system',
      'values falcon-sensor falcon-system node.image.tag',
    ]);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.action).toBe('upgrade');
    expect(result.value.warnings).toEqual([
      'The release is already installed; planning an upgrade instead of an install',
    ]);
    expect(result.value.commands.map((command) => command.argv[1])).toEqual([
      'repo',
      'upgrade',
      'rollout',
      'logs',
    ]);
  });

  it('should warn when the upgrade target is not newer than the installed tag', async () => {
    const { result } = await plan('upgrade', { kind: 'Present' }, { installedTag: '7.18.0-17106' });

    expect(result.ok && result.value.warnings).toEqual([
      'Installed image tag 7.18.0-17106 is not older than target 7.18.0-17106; the upgrade may be a no-op',
    ]);
  });

  it('should warn when the installed tag cannot be read', async () => {
    const { result } = await plan('upgrade', { kind: 'Present' });

    expect(result.ok && result.value.warnings).toEqual([
      'Installed image tag could not be read; upgrading to 7.18.0-17106',
    ]);
  });

  it('should plan an install when upgrading a missing release', async () => {
    const { result } = await plan('upgrade', { kind: 'NotPresent' });

    expect(result.ok && result.value.action).toBe('install');
    expect(result.ok && result.value.warnings).toEqual(['No installed release to upgrade; planning a fresh install']);
  });

  it('should abort without writing anything when the cluster state is unknown', async () => {
    const { result } = await plan('install', {
      kind: 'Unknown',
      query: 'helm status falcon-sensor -n falcon-system',
      reason: 'timed out after 30000ms',
    });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.guidance?.code).toBe(ERROR_CODES.clusterQuery);
    }
    expect(existsSync(valuesFile)).toBe(false);
  });

  it('should plan nothing when uninstalling a missing release', async () => {
    const { result } = await plan('uninstall', { kind: 'NotPresent' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.action).toBe('noop');
    expect(result.value.commands).toEqual([]);
    expect(result.value.valuesFile).toBeUndefined();
    expect(result.value.warnings).toEqual(['No installed release found; nothing to uninstall']);
  });

  it('should include namespace deletion in an uninstall plan on request', async () => {
    const { result, fakes } = await plan('uninstall', { kind: 'Present' }, { removeNamespace: true });

    expect(result.ok && result.value.commands.map((command) => command.argv.join(' '))).toEqual([
      'helm uninstall falcon-sensor -n falcon-system',
      'kubectl delete namespace falcon-system --ignore-not-found',
    ]);
    expect(fakes.helm.queries).toEqual(['status falcon-sensor falcon-system']);
    expect(existsSync(valuesFile)).toBe(false);
  });

  it('should require the mirrored image for an install', async () => {
    const { result } = await plan('install', { kind: 'NotPresent' }, { withImage: false });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBe(
        'Install and upgrade plans need the CID, component settings and mirrored image',
      );
      expect(result.guidance?.code).toBe(ERROR_CODES.userInput);
    }
  });

  it('should reject settings of another component', async () => {
    const fakes = createFakeServices({ clusterState: { kind: 'NotPresent' } });
    const input = planDeploymentTool.parse({
      action: 'install',
      component: 'kac',
      namespace: 'falcon-kac',
      valuesFile,
      cid: TEST_CID,
      settings: { component: 'sensor', backend: 'bpf' },
      image,
    });

    const result = await planDeploymentTool.handler(input, createTestContext(fakes.services));

    expect(!result.ok && result.error).toBe("Settings for 'sensor' cannot plan a 'kac' release");
    expect(existsSync(valuesFile)).toBe(false);
  });

  describe('other components', () => {
    it('should plan an admission controller install without namespace labels', async () => {
      const fakes = createFakeServices({ clusterState: { kind: 'NotPresent' } });
      const input = planDeploymentTool.parse({
        action: 'install',
        component: 'kac',
        namespace: 'falcon-kac',
        valuesFile,
        cid: TEST_CID,
        settings: { component: 'kac', clusterName: 'test-cluster' },
        image: { repository: 'localhost:5000/falcon-kac', tag: '7.20.0-1201' },
      });

      const result = await planDeploymentTool.handler(input, createTestContext(fakes.services));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.summary).toBe("🚀 Install plan for 'falcon-kac' in 'falcon-kac'");
      expect(result.value.commands.map((command) => command.argv.join(' '))).toEqual([
        'helm repo add crowdstrike https://crowdstrike.github.io/falcon-helm',
        'helm repo update',
        'kubectl create namespace falcon-kac',
        `helm install falcon-kac crowdstrike/falcon-kac -n falcon-kac -f ${valuesFile}`,
        'kubectl rollout status deployment/falcon-kac -n falcon-kac --timeout=120s',
        'kubectl logs -n=falcon-kac -l app.kubernetes.io/name=falcon-kac --tail=50',
      ]);
      expect(fakes.helm.queries).toEqual(['status falcon-kac falcon-kac']);
      expect(yaml.load(readFileSync(valuesFile, 'utf-8'))).toEqual({
        falcon: { cid: TEST_CID },
        image: { repository: 'localhost:5000/falcon-kac', tag: '7.20.0-1201', pullPolicy: 'Always' },
        clusterName: 'test-cluster',
      });
    });

    it('should read the image analyzer tag from its own values path on upgrade', async () => {
      const fakes = createFakeServices({ clusterState: { kind: 'Present' }, installedTag: '1.0.11' });
      const input = planDeploymentTool.parse({
        action: 'upgrade',
        component: 'iar',
        namespace: 'falcon-imageanalyzer',
        valuesFile,
        cid: TEST_CID,
        settings: { component: 'iar', clusterName: 'test-cluster', iarMode: 'socket', iarRuntime: 'docker' },
        clientId: 'test-client',
        clientSecret: 'test-secret',
        region: 'eu-1',
        image: { repository: 'localhost:5000/falcon-imageanalyzer', tag: '1.0.12' },
      });

      const result = await planDeploymentTool.handler(input, createTestContext(fakes.services));

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.warnings).toEqual([]);
      expect(fakes.helm.queries).toEqual([
        'status falcon-imageanalyzer falcon-imageanalyzer',
        'values falcon-imageanalyzer falcon-imageanalyzer image.tag',
      ]);
      expect(result.value.commands.map((command) => command.argv.join(' '))).toEqual([
        'helm repo update',
        `helm upgrade falcon-imageanalyzer crowdstrike/falcon-image-analyzer -n falcon-imageanalyzer -f ${valuesFile}`,
        'kubectl rollout status daemonset/falcon-imageanalyzer -n falcon-imageanalyzer --timeout=120s',
        'kubectl logs -n=falcon-imageanalyzer -l app.kubernetes.io/name=falcon-imageanalyzer --tail=50',
      ]);
      expect(yaml.load(readFileSync(valuesFile, 'utf-8'))).toMatchObject({
        crowdstrikeConfig: { clientSecret: 'test-secret', agentRuntime: 'docker' },
      });
      expect(statSync(valuesFile).mode & 0o777).toBe(0o600);
    });
  });
});
