import { describe, it, expect, jest, beforeEach } from '@jest/globals';
import { confirm, input, password, select } from '@inquirer/prompts';
import { createInteractiveInput } from '@/app/interactive-input';

jest.mock('@inquirer/prompts', () => ({
  input: jest.fn(),
  password: jest.fn(),
  select: jest.fn(),
  confirm: jest.fn(),
}));

function cancellation(name: string): Error {
  const error = new Error('User force closed the prompt with SIGINT');
  error.name = name;
  return error;
}

describe('createInteractiveInput', () => {
  beforeEach(() => {
    jest.mocked(input).mockReset();
    jest.mocked(password).mockReset();
    jest.mocked(select).mockReset();
    jest.mocked(confirm).mockReset();
  });

  it('should trim text answers', async () => {
    jest.mocked(input).mockResolvedValue('  registry.internal:5000  ');

    const answer = await createInteractiveInput().text({ name: 'local registry', message: 'Registry?' });

    expect(answer).toEqual({ ok: true, value: 'registry.internal:5000' });
  });

  it('should keep the saved secret when the password answer is empty', async () => {
    jest.mocked(password).mockResolvedValue('');

    const answer = await createInteractiveInput().text({
      name: 'client secret',
      message: 'Secret?',
      secret: true,
      default: 'test-secret',
    });

    expect(answer).toEqual({ ok: true, value: 'test-secret' });
  });

  it('should offer the choices of a select question', async () => {
    jest.mocked(select).mockResolvedValue('us-2');

    const answer = await createInteractiveInput().select({
      name: 'cloud region',
      message: 'Region?',
      choices: ['us-1', 'us-2'],
      default: 'us-1',
    });

    expect(answer).toEqual({ ok: true, value: 'us-2' });
    expect(jest.mocked(select).mock.calls[0]?.[0]).toEqual({
      message: 'Region?',
      choices: [
        { value: 'us-1', name: 'us-1' },
        { value: 'us-2', name: 'us-2' },
      ],
      default: 'us-1',
    });
  });

  it('should report a cancelled prompt as an interruption', async () => {
    jest.mocked(confirm).mockRejectedValue(cancellation('ExitPromptError'));
    const onInterrupt = jest.fn();

    const answer = await createInteractiveInput({ onInterrupt }).confirm({ message: 'Continue?', default: false });

    expect(onInterrupt).toHaveBeenCalledTimes(1);
    expect(answer.ok).toBe(false);
    if (!answer.ok) {
      expect(answer.error).toBe('Prompt cancelled');
      expect(answer.guidance?.message).toBe('Interrupted by operator');
    }
  });

  it('should turn other prompt errors into input failures', async () => {
    jest.mocked(input).mockRejectedValue(new Error('stdin is not a TTY'));
    const onInterrupt = jest.fn();

    const answer = await createInteractiveInput({ onInterrupt }).text({ name: 'CID', message: 'CID?' });

    expect(onInterrupt).not.toHaveBeenCalled();
    expect(answer.ok).toBe(false);
    if (!answer.ok) {
      expect(answer.error).toBe('Prompt failed: stdin is not a TTY');
      expect(answer.guidance?.code).toBe('UserInputError');
    }
  });
});
