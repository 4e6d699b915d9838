/**
 * Contextual guidance for CLI error handling
 * Prints the failing operation, its hint and resolution, the command to rerun
 * by hand and troubleshooting steps for the error class.
 */

import { ERROR_CODES, type ErrorCode, type FailureResult } from '@/types/core';

export interface GuidanceOptions {
  /** Print structured details as well */
  verbose?: boolean;
  /** Where lines go; stderr by default */
  write?: (line: string) => void;
}

/**
 * Troubleshooting steps organized by error class
 */
const GUIDANCE_MESSAGES: Record<ErrorCode, { title: string; steps: readonly string[] }> = {
  [ERROR_CODES.userInput]: {
    title: '💡 Input issue:',
    steps: [
      'Check the value against the expected format shown above',
      'Environment variables (FALCON_*) override prompts; unset a stale one',
    ],
  },
  [ERROR_CODES.dependencyMissing]: {
    title: '💡 Missing dependency:',
    steps: ['Install or upgrade the tool and make sure it is on PATH', 'Check the Docker daemon: docker info'],
  },
  [ERROR_CODES.connectivity]: {
    title: '💡 Network issue detected:',
    steps: [
      'Allow outbound HTTPS (443) to every listed domain',
      'Check proxy and firewall rules for this host',
      'Confirm the selected cloud region is the one your tenant lives in',
    ],
  },
  [ERROR_CODES.auth]: {
    title: '💡 Authentication issue:',
    steps: [
      'Verify the API client id and secret',
      'Make sure the API client has the Sensor Download and Falcon Images Download scopes',
      'Confirm the cloud region matches the API client',
    ],
  },
  [ERROR_CODES.registry]: {
    title: '💡 Registry issue:',
    steps: [
      'Run the command above by hand to see the full registry response',
      'Check login to the local registry: docker login <registry>',
      'Every mirror step is safe to repeat; rerun once the cause is fixed',
    ],
  },
  [ERROR_CODES.clusterQuery]: {
    title: '💡 Cluster issue:',
    steps: ['Check the current context: kubectl config current-context', 'Test access: kubectl get nodes'],
  },
  [ERROR_CODES.configCorrupt]: {
    title: '💡 Saved configuration issue:',
    steps: ['Delete the saved configuration file and rerun the wizard'],
  },
};

/**
 * Print guidance for a failed result
 */
export function provideContextualGuidance(failure: FailureResult, options: GuidanceOptions = {}): void {
  const write = options.write ?? ((line: string) => console.error(line));
  const guidance = failure.guidance;

  write(`\n❌ ${failure.error}`);
  if (guidance === undefined) {
    return;
  }

  if (guidance.hint) {
    write(`   Hint: ${guidance.hint}`);
  }
  if (guidance.resolution) {
    write(`   Resolution: ${guidance.resolution}`);
  }
  if (guidance.command) {
    write(`\n🔁 Rerun manually:\n   ${guidance.command}`);
  }

  if (guidance.code) {
    const category = GUIDANCE_MESSAGES[guidance.code];
    write(`\n${category.title}`);
    category.steps.forEach((step) => write(`  • ${step}`));
  }

  if (options.verbose && guidance.details) {
    write('\n📍 Details:');
    write(JSON.stringify(guidance.details, null, 2));
  }
}
