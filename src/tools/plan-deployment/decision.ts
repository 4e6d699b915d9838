/**
 * Requested action × cluster state → planned action.
 *
 * Every combination is listed; an `Unknown` cluster state always aborts.
 */

import { Success, Failure, ERROR_CODES, type ClusterState, type DeploymentAction, type PlannedAction, type Result } from '@/types';
import { ERROR_MESSAGES } from '@/lib/errors';

export interface Decision {
  action: PlannedAction;
  warning?: string;
}

type KnownState = Exclude<ClusterState['kind'], 'Unknown'>;

export const DECISION_TABLE: Readonly<Record<DeploymentAction, Readonly<Record<KnownState, Decision>>>> = {
  install: {
    NotPresent: { action: 'install' },
    Present: {
      action: 'upgrade',
      warning: 'The release is already installed; planning an upgrade instead of an install',
    },
  },
  upgrade: {
    NotPresent: {
      action: 'install',
      warning: 'No installed release to upgrade; planning a fresh install',
    },
    Present: { action: 'upgrade' },
  },
  uninstall: {
    NotPresent: { action: 'noop', warning: 'No installed release found; nothing to uninstall' },
    Present: { action: 'uninstall' },
  },
};

export function decideAction(requested: DeploymentAction, state: ClusterState): Result<Decision> {
  if (state.kind === 'Unknown') {
    return Failure(`${ERROR_MESSAGES.CLUSTER_STATE_UNKNOWN}: ${state.reason}`, {
      message: ERROR_MESSAGES.CLUSTER_STATE_UNKNOWN,
      hint: state.reason,
      resolution: 'Check cluster access and the current kubectl context, then rerun',
      command: state.query,
      code: ERROR_CODES.clusterQuery,
    });
  }
  return Success(DECISION_TABLE[requested][state.kind]);
}
