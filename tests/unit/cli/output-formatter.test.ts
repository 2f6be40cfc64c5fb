import { describe, it, expect, vi, afterEach } from 'vitest';
import { formatResult, formatJson } from '../../../src/cli/output-formatter.js';
import { interpretCliResult } from '../../../src/cli/interpret-result.js';
import { success, failure, misuse, successMessage } from '../../../src/cli/types/cli-result.js';
import { ThrowingProcessTerminator } from '../../../src/runtime/adapters/throwing-process-terminator.js';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('formatResult', () => {
  it('prints data as plain JSON', () => {
    const outcome = { action: 'SIT', score: 0.5, rewarded: false };

    expect(formatResult(success({ message: 'Action SIT', data: outcome }))).toBe(
      '{\n  "action": "SIT",\n  "score": 0.5,\n  "rewarded": false\n}'
    );
    expect(formatJson([1])).toBe('[\n  1\n]');
  });

  it('prints text verbatim without the trailing newline', () => {
    expect(formatResult(success({ message: 'Settings', text: 'weights: {}\n' }))).toBe('weights: {}');
  });

  it('prints a message, details and suggestions', () => {
    const text = formatResult(failure('Invalid settings', { details: ['weights: bad'], suggestions: ['fix it'] }));

    expect(text).toContain('Invalid settings');
    expect(text).toContain('  • weights: bad');
    expect(text).toContain('  • fix it');
  });

  it('prints nothing for a bare success', () => {
    expect(formatResult(success())).toBe('');
  });
});

describe('interpretCliResult', () => {
  it('returns on success', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    interpretCliResult(successMessage('done'), new ThrowingProcessTerminator());

    expect(log).toHaveBeenCalledTimes(1);
  });

  it('terminates with the mapped exit code on failure', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const terminator = new ThrowingProcessTerminator();

    expect(() => interpretCliResult(misuse('bad flag'), terminator)).toThrow('[ProcessTerminator] terminate(misuse)');
    expect(() => interpretCliResult(failure('broken'), terminator)).toThrow('[ProcessTerminator] terminate(failure)');
  });
});
