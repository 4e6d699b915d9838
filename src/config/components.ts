/**
 * Deployable components
 *
 * One run prepares one component. Each pins its Helm release and chart, the
 * image name used in both registries, its default namespace, and where its
 * chart records the image tag.
 */

import { z } from 'zod';
import { HELM } from './constants';

export const FALCON_COMPONENTS = ['sensor', 'kac', 'iar'] as const;

export const falconComponentSchema = z.enum(FALCON_COMPONENTS).describe('Component to deploy');

export type FalconComponent = z.infer<typeof falconComponentSchema>;

export interface ComponentProfile {
  id: FalconComponent;
  /** Human name used in status lines */
  title: string;
  release: string;
  chart: string;
  /** Image name in the vendor and local registries */
  imageName: string;
  defaultNamespace: string;
  /** Key path of the image tag in the release's Helm values */
  imageTagPath: readonly string[];
  /** Apply the privileged pod-security labels before install */
  labelNamespace: boolean;
}

export const COMPONENTS: Readonly<Record<FalconComponent, ComponentProfile>> = {
  sensor: {
    id: 'sensor',
    title: 'Falcon sensor',
    release: 'falcon-sensor',
    chart: `${HELM.REPO_NAME}/falcon-sensor`,
    imageName: 'falcon-sensor',
    defaultNamespace: 'falcon-system',
    imageTagPath: ['node', 'image', 'tag'],
    labelNamespace: true,
  },
  kac: {
    id: 'kac',
    title: 'Kubernetes admission controller',
    release: 'falcon-kac',
    chart: `${HELM.REPO_NAME}/falcon-kac`,
    imageName: 'falcon-kac',
    defaultNamespace: 'falcon-kac',
    imageTagPath: ['image', 'tag'],
    labelNamespace: false,
  },
  iar: {
    id: 'iar',
    title: 'Image assessment at runtime',
    release: 'falcon-imageanalyzer',
    chart: `${HELM.REPO_NAME}/falcon-image-analyzer`,
    imageName: 'falcon-imageanalyzer',
    defaultNamespace: 'falcon-imageanalyzer',
    imageTagPath: ['image', 'tag'],
    labelNamespace: true,
  },
};

/**
 * File name of the rendered Helm values for a component.
 */
export function valuesFileName(component: FalconComponent): string {
  return `${COMPONENTS[component].release}-values.yaml`;
}
