/**
 * Application Constants and Defaults
 *
 * Consolidated configuration values for the whole workflow: timeouts,
 * retry policy, Helm and Kubernetes names, wizard defaults and the
 * environment variables that override wizard prompts.
 */

import { z } from 'zod';

/**
 * Log level schema shared by the CLI flag and LOG_LEVEL.
 */
export const logLevelSchema = z
  .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  .describe('Logging level');

export type LogLevel = z.infer<typeof logLevelSchema>;

/**
 * Default timeout values in milliseconds
 */
export const DEFAULT_TIMEOUTS = {
  /** Vendor API request timeout: 30 seconds. */
  apiRequest: 30_000,
  /** Single connectivity probe: 5 seconds. */
  connectivityProbe: 5_000,
  /** Whole connectivity preflight: 15 seconds. */
  connectivityOverall: 15_000,
  /** External tool version checks: 15 seconds. */
  versionCheck: 15_000,
  /** Helm and kubectl cluster queries: 30 seconds. */
  clusterQuery: 30_000,
} as const;

/**
 * Retry configuration for transient vendor API failures
 */
export const RETRY = {
  /** Total attempts including the first */
  MAX_ATTEMPTS: 3,
  /** Initial backoff delay (ms) */
  INITIAL_DELAY: 500,
  /** Maximum backoff delay (ms) */
  MAX_DELAY: 4_000,
  /** Backoff multiplier */
  MULTIPLIER: 2,
} as const;

/**
 * OAuth token handling
 */
export const AUTH = {
  /** Refresh a cached token this long before it expires (ms) */
  REFRESH_MARGIN: 60_000,
  /** Lifetime assumed when the token endpoint omits expires_in (s) */
  DEFAULT_EXPIRES_IN: 1799,
} as const;

/**
 * Connectivity preflight settings
 */
export const NETWORK = {
  /** Port probed on every required domain */
  PORT: 443,
  /** Maximum concurrent probes */
  CONCURRENCY: 10,
} as const;

/**
 * Image and registry constants
 */
export const IMAGE = {
  /** Tag keyword that resolves to the newest versioned tag */
  LATEST_KEYWORD: 'latest',
  /** Pull policy written into the values file */
  PULL_POLICY: 'Always',
} as const;

/**
 * Helm constants
 */
export const HELM = {
  REPO_NAME: 'crowdstrike',
  REPO_URL: 'https://crowdstrike.github.io/falcon-helm',
  /** Minimum supported helm version */
  MIN_VERSION: '3.0.0',
  /** stderr fragment helm prints for a missing release */
  RELEASE_NOT_FOUND: 'release: not found',
} as const;

/**
 * Kubernetes constants
 */
export const KUBERNETES = {
  /** Minimum supported kubectl version */
  MIN_KUBECTL_VERSION: '1.20.0',
  ROLLOUT_TIMEOUT: '120s',
  LOGS_TAIL_LINES: 50,
  POD_SECURITY_LABELS: [
    'pod-security.kubernetes.io/enforce=privileged',
    'pod-security.kubernetes.io/audit=privileged',
    'pod-security.kubernetes.io/warn=privileged',
  ],
} as const;

/**
 * Wizard defaults
 */
export const WIZARD_DEFAULTS = {
  region: 'eu-1',
  localRegistry: 'localhost:5000',
  imageTag: IMAGE.LATEST_KEYWORD,
  component: 'sensor',
  backend: 'bpf',
  iarMode: 'watcher',
  iarRuntime: 'containerd',
} as const;

/**
 * Persisted state
 */
export const STATE = {
  SCHEMA_VERSION: 2,
  DIR_SEGMENTS: ['.config', 'sensor-helm-prep'],
  FILE_NAME: 'deployment-config.json',
} as const;

/**
 * Environment variables read by the CLI
 */
export const ENV_VARS = {
  CID: 'FALCON_CID',
  CLIENT_ID: 'FALCON_CLIENT_ID',
  CLIENT_SECRET: 'FALCON_CLIENT_SECRET',
  LOCAL_REGISTRY: 'FALCON_LOCAL_REGISTRY',
  IMAGE_TAG: 'FALCON_IMAGE_TAG',
  CLOUD_REGION: 'FALCON_CLOUD_REGION',
  CLUSTER_NAME: 'FALCON_CLUSTER_NAME',
  LOG_LEVEL: 'LOG_LEVEL',
  CONFIG_DIR: 'SENSOR_PREP_CONFIG_DIR',
} as const;

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  /** 128 + SIGINT */
  INTERRUPTED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
