import { describe, it, expect } from '@jest/globals';
import { provideContextualGuidance } from '@/cli/guidance';
import { Failure, ERROR_CODES, type FailureResult, type Result } from '@/types';

function failure(result: Result<unknown>): FailureResult {
  if (result.ok) throw new Error('expected a failure');
  return result;
}

function render(result: FailureResult, verbose = false): string[] {
  const lines: string[] = [];
  provideContextualGuidance(result, { verbose, write: (line) => lines.push(line) });
  return lines;
}

describe('provideContextualGuidance', () => {
  const pushFailure = failure(
    Failure('Image mirror failed at step "push": denied', {
      message: 'Push rejected',
      resolution: 'Log in to the local registry and rerun',
      command: 'docker push localhost:5000/falcon-sensor:7.18.0-17106',
      code: ERROR_CODES.registry,
      details: { step: 'push' },
    }),
  );

  it('should print the error alone when there is no guidance', () => {
    expect(render(failure(Failure('boom')))).toEqual(['\n❌ boom']);
  });

  it('should print resolution, rerun command and registry troubleshooting', () => {
    expect(render(pushFailure)).toEqual([
      '\n❌ Image mirror failed at step "push": denied',
      '   Resolution: Log in to the local registry and rerun',
      '\n🔁 Rerun manually:\n   docker push localhost:5000/falcon-sensor:7.18.0-17106',
      '\n💡 Registry issue:',
      '  • Run the command above by hand to see the full registry response',
      '  • Check login to the local registry: docker login <registry>',
      '  • Every mirror step is safe to repeat; rerun once the cause is fixed',
    ]);
  });

  it('should add structured details in verbose mode', () => {
    const lines = render(pushFailure, true);

    expect(lines.slice(-2)).toEqual(['\n📍 Details:', '{\n  "step": "push"\n}']);
  });

  it('should print the hint before the resolution', () => {
    const lines = render(
      failure(
        Failure('Invalid namespace: too long', {
          message: 'Invalid namespace',
          hint: 'Value received: "x"',
          resolution: 'Correct the answer or --namespace',
          code: ERROR_CODES.userInput,
        }),
      ),
    );

    expect(lines.slice(0, 4)).toEqual([
      '\n❌ Invalid namespace: too long',
      '   Hint: Value received: "x"',
      '   Resolution: Correct the answer or --namespace',
      '\n💡 Input issue:',
    ]);
  });
});
