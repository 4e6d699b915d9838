import { describe, it, expect } from '@jest/globals';
import yaml from 'js-yaml';
import { buildValues, renderValuesYaml } from '@/tools/plan-deployment/values';
import { ERROR_CODES } from '@/types';
import { TEST_CID } from '../../__support__/utilities/fakes';

const image = { repository: 'localhost:5000/falcon-sensor', tag: '7.18.0-17106' };
const api = { clientId: 'test-client', clientSecret: 'test-secret', region: 'eu-1' } as const;

describe('component values', () => {
  describe('sensor', () => {
    it('should include the pull secret when one is given', () => {
      const values = buildValues({
        cid: TEST_CID,
        image,
        settings: { component: 'sensor', backend: 'kernel' },
        registryConfigJSON: 'e30=',
      });

      expect(values).toEqual({
        ok: true,
        value: {
          falcon: { cid: TEST_CID },
          node: {
            enabled: true,
            image: { ...image, pullPolicy: 'Always', registryConfigJSON: 'e30=' },
            backend: 'kernel',
          },
        },
      });
    });

    it('should omit an empty pull secret', () => {
      const values = buildValues({
        cid: TEST_CID,
        image,
        settings: { component: 'sensor', backend: 'bpf' },
        registryConfigJSON: '',
      });

      expect(values).toEqual({
        ok: true,
        value: {
          falcon: { cid: TEST_CID },
          node: { enabled: true, image: { ...image, pullPolicy: 'Always' }, backend: 'bpf' },
        },
      });
    });

    it('should render YAML that reads back to the same values', () => {
      const values = buildValues({ cid: TEST_CID, image, settings: { component: 'sensor', backend: 'bpf' } });

      expect(values.ok).toBe(true);
      if (values.ok) {
        expect(yaml.load(renderValuesYaml(values.value))).toEqual(values.value);
      }
    });
  });

  describe('admission controller', () => {
    it('should place the image at the top level with the cluster name', () => {
      const kacImage = { repository: 'localhost:5000/falcon-kac', tag: '7.20.0-1201' };

      const values = buildValues({
        cid: TEST_CID,
        image: kacImage,
        settings: { component: 'kac', clusterName: 'test-cluster' },
        registryConfigJSON: 'e30=',
      });

      expect(values).toEqual({
        ok: true,
        value: {
          falcon: { cid: TEST_CID },
          image: { ...kacImage, pullPolicy: 'Always', registryConfigJSON: 'e30=' },
          clusterName: 'test-cluster',
        },
      });
    });
  });

  describe('image analyzer', () => {
    const iarImage = { repository: 'localhost:5000/falcon-imageanalyzer', tag: '1.0.12' };

    it('should run as a deployment in watcher mode', () => {
      const values = buildValues({
        cid: TEST_CID,
        image: iarImage,
        settings: { component: 'iar', clusterName: 'test-cluster', iarMode: 'watcher' },
        api,
      });

      expect(values).toEqual({
        ok: true,
        value: {
          image: { ...iarImage, pullPolicy: 'Always' },
          crowdstrikeConfig: {
            cid: TEST_CID,
            clientID: 'test-client',
            clientSecret: 'test-secret',
            agentRegion: 'eu-1',
            clusterName: 'test-cluster',
          },
          deployment: { enabled: true },
          daemonset: { enabled: false },
        },
      });
    });

    it('should run as a daemonset with the node runtime in socket mode', () => {
      const values = buildValues({
        cid: TEST_CID,
        image: iarImage,
        settings: { component: 'iar', clusterName: 'test-cluster', iarMode: 'socket', iarRuntime: 'crio' },
        api,
      });

      expect(values.ok && values.value).toMatchObject({
        crowdstrikeConfig: { agentRuntime: 'crio' },
        deployment: { enabled: false },
        daemonset: { enabled: true },
      });
    });

    it('should default the socket runtime to containerd', () => {
      const values = buildValues({
        cid: TEST_CID,
        image: iarImage,
        settings: { component: 'iar', clusterName: 'test-cluster', iarMode: 'socket' },
        api,
      });

      expect(values.ok && values.value).toMatchObject({ crowdstrikeConfig: { agentRuntime: 'containerd' } });
    });

    it('should require API access', () => {
      const values = buildValues({
        cid: TEST_CID,
        image: iarImage,
        settings: { component: 'iar', clusterName: 'test-cluster', iarMode: 'watcher' },
      });

      expect(values.ok).toBe(false);
      if (!values.ok) {
        expect(values.error).toBe('Image analyzer values need the API client id, secret and region');
        expect(values.guidance?.code).toBe(ERROR_CODES.userInput);
      }
    });
  });
});
