/**
 * Deployment wizard
 *
 * Collects a `WizardConfig` through an `InputSource`. Overrides from the
 * environment and flags replace the matching prompt; every value, typed or
 * overridden, goes through the same zod schema.
 *
 * The cloud region is asked first so connectivity can be checked before any
 * credential is requested; `WizardSession.complete` asks the rest.
 *
 * With saved answers for the same component the operator is asked whether to
 * re-configure. Reusing them asks only for what was not saved, which is at
 * most the client secret. Answers saved for another component only seed the
 * shared fields.
 */

import { z } from 'zod';
import type { Logger } from 'pino';
import { COMPONENTS, type FalconComponent } from '@/config/components';
import { WIZARD_DEFAULTS } from '@/config/constants';
import { CLOUD_REGION_IDS, type CloudRegionId } from '@/config/regions';
import {
  backend as backendSchema,
  cid as cidSchema,
  clusterName as clusterNameSchema,
  iarMode as iarModeSchema,
  iarRuntime as iarRuntimeSchema,
  imageTag as imageTagSchema,
  localRegistry as localRegistrySchema,
  namespace as namespaceSchema,
  region as regionSchema,
  requiredText,
} from '@/tools/shared/schemas';
import {
  Success,
  Failure,
  ERROR_CODES,
  CONTAINER_RUNTIMES,
  IAR_MODES,
  SENSOR_BACKENDS,
  type ComponentSettings,
  type ContainerRuntime,
  type DeploymentAction,
  type IarMode,
  type Result,
  type SensorBackend,
  type WizardConfig,
} from '@/types';
import { OVERRIDE_ENV_VARS, type InputSource, type WizardField, type WizardOverrides } from './input-source';

type ChoiceField = 'region' | 'backend' | 'iarMode' | 'iarRuntime';
type TextField = Exclude<WizardField, ChoiceField>;

interface TextFieldDefinition {
  name: string;
  message: string;
  schema: z.ZodType<string, z.ZodTypeDef, string>;
  secret?: boolean;
  fallback?: string;
}

const TEXT_FIELDS: Record<TextField, TextFieldDefinition> = {
  cid: { name: 'CID', message: 'Customer ID with checksum (CID)', schema: cidSchema },
  clientId: { name: 'client id', message: 'API client id', schema: requiredText('Client id') },
  clientSecret: {
    name: 'client secret',
    message: 'API client secret',
    schema: requiredText('Client secret'),
    secret: true,
  },
  localRegistry: {
    name: 'local registry',
    message: 'Local registry (host[:port])',
    schema: localRegistrySchema,
    fallback: WIZARD_DEFAULTS.localRegistry,
  },
  imageTag: {
    name: 'image tag',
    message: 'Image tag (or "latest")',
    schema: imageTagSchema,
    fallback: WIZARD_DEFAULTS.imageTag,
  },
  namespace: { name: 'namespace', message: 'Kubernetes namespace', schema: namespaceSchema },
  clusterName: { name: 'cluster name', message: 'Kubernetes cluster name', schema: clusterNameSchema },
};

interface ChoiceFieldDefinition<T extends string> {
  field: ChoiceField;
  name: string;
  message: string;
  choices: readonly T[];
  schema: z.ZodType<T, z.ZodTypeDef, string>;
  fallback: T;
}

const REGION: ChoiceFieldDefinition<CloudRegionId> = {
  field: 'region',
  name: 'cloud region',
  message: 'Cloud region',
  choices: CLOUD_REGION_IDS,
  schema: regionSchema,
  fallback: WIZARD_DEFAULTS.region,
};

const BACKEND: ChoiceFieldDefinition<SensorBackend> = {
  field: 'backend',
  name: 'sensor backend',
  message: 'Sensor backend',
  choices: SENSOR_BACKENDS,
  schema: backendSchema,
  fallback: WIZARD_DEFAULTS.backend,
};

const IAR_MODE: ChoiceFieldDefinition<IarMode> = {
  field: 'iarMode',
  name: 'image analyzer mode',
  message: 'Image analyzer mode (watcher: one deployment, socket: a daemonset per node)',
  choices: IAR_MODES,
  schema: iarModeSchema,
  fallback: WIZARD_DEFAULTS.iarMode,
};

const IAR_RUNTIME: ChoiceFieldDefinition<ContainerRuntime> = {
  field: 'iarRuntime',
  name: 'container runtime',
  message: 'Container runtime of the nodes',
  choices: CONTAINER_RUNTIMES,
  schema: iarRuntimeSchema,
  fallback: WIZARD_DEFAULTS.iarRuntime,
};

const FLAG_SOURCES: Partial<Record<WizardField, string>> = {
  region: '--region',
  namespace: '--namespace',
  backend: '--backend',
  clusterName: '--cluster-name',
  iarMode: '--iar-mode',
  iarRuntime: '--iar-runtime',
};

function sourceOf(field: WizardField): string | undefined {
  const envVar = OVERRIDE_ENV_VARS[field];
  const flag = FLAG_SOURCES[field];
  if (envVar && flag) return `${flag} or ${envVar}`;
  return flag ?? envVar;
}

function parseAnswer<T>(
  field: WizardField,
  label: string,
  schema: z.ZodType<T, z.ZodTypeDef, string>,
  value: string,
): Result<T> {
  const parsed = schema.safeParse(value);
  if (parsed.success) {
    return Success(parsed.data);
  }
  const issue = parsed.error.issues[0]?.message ?? 'invalid value';
  const source = sourceOf(field);
  const message = `Invalid ${label}: ${issue}`;
  return Failure(message, {
    message,
    hint: `Value received: "${field === 'clientSecret' ? '<hidden>' : value}"`,
    ...(source !== undefined && { resolution: `Correct the answer or ${source}` }),
    code: ERROR_CODES.userInput,
  });
}

export interface WizardOptions {
  input: InputSource;
  overrides: WizardOverrides;
  action: DeploymentAction;
  component: FalconComponent;
  /** Answers from the previous run, if any */
  saved: WizardConfig | null;
  logger: Logger;
}

/**
 * A wizard run with its region answered.
 */
export interface WizardSession {
  region: CloudRegionId;
  /** Ask the remaining questions */
  complete(): Promise<Result<WizardConfig>>;
}

interface Asker {
  text(field: TextField, previous?: string): Promise<Result<string>>;
  choice<T extends string>(definition: ChoiceFieldDefinition<T>, previous?: T): Promise<Result<T>>;
}

function createAsker({ input, overrides }: Pick<WizardOptions, 'input' | 'overrides'>): Asker {
  return {
    async text(field, previous) {
      const definition = TEXT_FIELDS[field];
      const override = overrides[field];
      if (override !== undefined) {
        return parseAnswer(field, definition.name, definition.schema, override);
      }
      const fallback = previous ?? definition.fallback;
      const source = sourceOf(field);
      const answer = await input.text({
        name: definition.name,
        message: definition.message,
        validate: (value) => {
          const parsed = definition.schema.safeParse(value);
          return parsed.success ? undefined : parsed.error.issues[0]?.message;
        },
        ...(fallback !== undefined && { default: fallback }),
        ...(definition.secret === true && { secret: true }),
        ...(source !== undefined && { source }),
      });
      if (!answer.ok) return answer;
      return parseAnswer(field, definition.name, definition.schema, answer.value);
    },

    async choice(definition, previous) {
      const override = overrides[definition.field];
      if (override !== undefined) {
        return parseAnswer(definition.field, definition.name, definition.schema, override);
      }
      const source = sourceOf(definition.field);
      return input.select({
        name: definition.name,
        message: definition.message,
        choices: definition.choices,
        default: definition.schema.catch(definition.fallback).parse(previous),
        ...(source !== undefined && { source }),
      });
    },
  };
}

/**
 * Answer with the saved value unless an override replaces it or nothing was
 * saved.
 */
function keepSaved(asker: Asker, overrides: WizardOverrides): Asker {
  function kept<T>(field: WizardField, previous: T | undefined, ask: () => Promise<Result<T>>): Promise<Result<T>> {
    if (overrides[field] === undefined && previous !== undefined) {
      return Promise.resolve(Success(previous));
    }
    return ask();
  }

  return {
    text: (field, previous) => kept(field, previous, () => asker.text(field, previous)),
    choice: (definition, previous) => kept(definition.field, previous, () => asker.choice(definition, previous)),
  };
}

interface PreviousAnswers {
  cid?: string | undefined;
  clientId?: string | undefined;
  clientSecret?: string | undefined;
  region?: CloudRegionId | undefined;
  localRegistry?: string | undefined;
  imageTag?: string | undefined;
  namespace: string;
  settings?: ComponentSettings | undefined;
}

function previousAnswers(saved: WizardConfig | null, component: FalconComponent): PreviousAnswers {
  const same = saved?.settings.component === component ? saved : null;
  return {
    cid: saved?.cid,
    clientId: saved?.clientId,
    clientSecret: saved?.clientSecret,
    region: saved?.region,
    localRegistry: saved?.localRegistry,
    imageTag: same?.imageTag,
    namespace: same?.namespace ?? COMPONENTS[component].defaultNamespace,
    settings: same?.settings,
  };
}

async function askSettings(
  asker: Asker,
  component: FalconComponent,
  previous: ComponentSettings | undefined,
): Promise<Result<ComponentSettings>> {
  switch (component) {
    case 'sensor': {
      const backend = await asker.choice(BACKEND, previous?.component === 'sensor' ? previous.backend : undefined);
      if (!backend.ok) return backend;
      const settings: ComponentSettings = { component, backend: backend.value };
      return Success(settings);
    }

    case 'kac': {
      const clusterName = await asker.text(
        'clusterName',
        previous?.component === 'kac' ? previous.clusterName : undefined,
      );
      if (!clusterName.ok) return clusterName;
      const settings: ComponentSettings = { component, clusterName: clusterName.value };
      return Success(settings);
    }

    case 'iar': {
      const prior = previous?.component === 'iar' ? previous : undefined;
      const clusterName = await asker.text('clusterName', prior?.clusterName);
      if (!clusterName.ok) return clusterName;
      const iarMode = await asker.choice(IAR_MODE, prior?.iarMode);
      if (!iarMode.ok) return iarMode;
      const settings: Extract<ComponentSettings, { component: 'iar' }> = {
        component,
        clusterName: clusterName.value,
        iarMode: iarMode.value,
      };
      if (iarMode.value === 'socket') {
        const runtime = await asker.choice(IAR_RUNTIME, prior?.iarRuntime);
        if (!runtime.ok) return runtime;
        settings.iarRuntime = runtime.value;
      }
      return Success(settings);
    }
  }
}

async function completeAnswers(
  asker: Asker,
  region: CloudRegionId,
  previous: PreviousAnswers,
  options: WizardOptions,
): Promise<Result<WizardConfig>> {
  const cid = await asker.text('cid', previous.cid);
  if (!cid.ok) return cid;
  const clientId = await asker.text('clientId', previous.clientId);
  if (!clientId.ok) return clientId;
  const clientSecret = await asker.text('clientSecret', previous.clientSecret);
  if (!clientSecret.ok) return clientSecret;
  const localRegistry = await asker.text('localRegistry', previous.localRegistry);
  if (!localRegistry.ok) return localRegistry;
  const imageTag = await asker.text('imageTag', previous.imageTag);
  if (!imageTag.ok) return imageTag;
  const namespace = await asker.text('namespace', previous.namespace);
  if (!namespace.ok) return namespace;
  const settings = await askSettings(asker, options.component, previous.settings);
  if (!settings.ok) return settings;

  return Success({
    cid: cid.value,
    clientId: clientId.value,
    clientSecret: clientSecret.value,
    region,
    localRegistry: localRegistry.value,
    imageTag: imageTag.value,
    namespace: namespace.value,
    settings: settings.value,
    action: options.action,
  });
}

/**
 * Start collecting the configuration for an install or upgrade. Resolves
 * once the region is known.
 */
export async function startWizard(options: WizardOptions): Promise<Result<WizardSession>> {
  const { saved, input, component } = options;
  let asker = createAsker(options);

  if (saved !== null && saved.settings.component === component) {
    const reconfigure = await input.confirm({
      message: 'A saved configuration was found. Do you want to re-configure?',
      default: false,
    });
    if (!reconfigure.ok) return reconfigure;
    if (!reconfigure.value) {
      asker = keepSaved(asker, options.overrides);
      options.logger.info({ reused: true, component }, 'Reusing saved configuration');
    }
  }

  const previous = previousAnswers(saved, component);
  const region = await asker.choice(REGION, previous.region);
  if (!region.ok) return region;

  return Success({
    region: region.value,
    complete: () => completeAnswers(asker, region.value, previous, options),
  });
}

/**
 * Namespace of the release to remove: override, then a prompt defaulting to
 * the saved namespace of the same component.
 */
export async function askUninstallNamespace(options: Omit<WizardOptions, 'action'>): Promise<Result<string>> {
  return createAsker(options).text('namespace', previousAnswers(options.saved, options.component).namespace);
}
