import checkConnectivityTool from './check-connectivity/tool';
import checkPrerequisitesTool from './check-prerequisites/tool';
import mirrorImageTool from './mirror-image/tool';
import planDeploymentTool from './plan-deployment/tool';

const TOOL_NAME = {
  CHECK_CONNECTIVITY: 'check-connectivity',
  CHECK_PREREQUISITES: 'check-prerequisites',
  MIRROR_IMAGE: 'mirror-image',
  PLAN_DEPLOYMENT: 'plan-deployment',
} as const;

export type ToolName = (typeof TOOL_NAME)[keyof typeof TOOL_NAME];

export type Tool = (
  | typeof checkConnectivityTool
  | typeof checkPrerequisitesTool
  | typeof mirrorImageTool
  | typeof planDeploymentTool
) & { name: ToolName };

// Workflow order
export const ALL_TOOLS: readonly Tool[] = [
  checkPrerequisitesTool,
  checkConnectivityTool,
  mirrorImageTool,
  planDeploymentTool,
] as const;

export {
  TOOL_NAME,
  checkConnectivityTool,
  checkPrerequisitesTool,
  mirrorImageTool,
  planDeploymentTool,
};
