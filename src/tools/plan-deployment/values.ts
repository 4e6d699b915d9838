/**
 * Helm values for each component chart.
 */

import yaml from 'js-yaml';
import { IMAGE, WIZARD_DEFAULTS } from '@/config/constants';
import type { CloudRegionId } from '@/config/regions';
import {
  Success,
  Failure,
  ERROR_CODES,
  type ComponentSettings,
  type ImageLocation,
  type Result,
  type SensorBackend,
} from '@/types';

interface ImageValues {
  repository: string;
  tag: string;
  pullPolicy: string;
  registryConfigJSON?: string;
}

export interface SensorValues {
  falcon: { cid: string };
  node: {
    enabled: true;
    image: ImageValues;
    backend: SensorBackend;
  };
}

export interface KacValues {
  falcon: { cid: string };
  image: ImageValues;
  clusterName: string;
}

export interface IarValues {
  image: ImageValues;
  crowdstrikeConfig: {
    cid: string;
    clientID: string;
    clientSecret: string;
    agentRegion: CloudRegionId;
    clusterName: string;
    agentRuntime?: string;
  };
  deployment: { enabled: boolean };
  daemonset: { enabled: boolean };
}

export type ComponentValues = SensorValues | KacValues | IarValues;

/**
 * API access the image analyzer needs at runtime.
 */
export interface ApiAccess {
  clientId: string;
  clientSecret: string;
  region: CloudRegionId;
}

export interface ValuesInput {
  cid: string;
  image: ImageLocation;
  settings: ComponentSettings;
  /** Omitted from the values when empty */
  registryConfigJSON?: string;
  /** Required for the image analyzer */
  api?: ApiAccess;
}

function imageValues(input: ValuesInput): ImageValues {
  const image: ImageValues = {
    repository: input.image.repository,
    tag: input.image.tag,
    pullPolicy: IMAGE.PULL_POLICY,
  };
  if (input.registryConfigJSON) {
    image.registryConfigJSON = input.registryConfigJSON;
  }
  return image;
}

export function buildValues(input: ValuesInput): Result<ComponentValues> {
  const { settings } = input;

  switch (settings.component) {
    case 'sensor':
      return Success({
        falcon: { cid: input.cid },
        node: { enabled: true, image: imageValues(input), backend: settings.backend },
      });

    case 'kac':
      return Success({
        falcon: { cid: input.cid },
        image: imageValues(input),
        clusterName: settings.clusterName,
      });

    case 'iar': {
      const { api } = input;
      if (api === undefined) {
        const error = 'Image analyzer values need the API client id, secret and region';
        return Failure(error, { message: error, code: ERROR_CODES.userInput });
      }
      const socket = settings.iarMode === 'socket';
      const values: IarValues = {
        image: imageValues(input),
        crowdstrikeConfig: {
          cid: input.cid,
          clientID: api.clientId,
          clientSecret: api.clientSecret,
          agentRegion: api.region,
          clusterName: settings.clusterName,
        },
        deployment: { enabled: !socket },
        daemonset: { enabled: socket },
      };
      if (socket) {
        values.crowdstrikeConfig.agentRuntime = settings.iarRuntime ?? WIZARD_DEFAULTS.iarRuntime;
      }
      return Success(values);
    }
  }
}

export function renderValuesYaml(values: ComponentValues): string {
  return yaml.dump(values, { lineWidth: -1, noRefs: true });
}
