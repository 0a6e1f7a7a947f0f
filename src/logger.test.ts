import { describe, it, expect, vi, afterEach, beforeEach } from 'vitest';
import { logDebug, logError, logWarning } from './logger';

describe('logger', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('stays quiet without JSON_TO_STRUCT_DEBUG', () => {
    vi.stubEnv('JSON_TO_STRUCT_DEBUG', '0');
    logDebug('decode', 'hidden');
    logWarning('inference', 'hidden');
    expect(console.error).not.toHaveBeenCalled();
  });

  it('prints debug lines and metadata when enabled', () => {
    vi.stubEnv('JSON_TO_STRUCT_DEBUG', '1');
    logDebug('decode', 'Decoded JSON document', { kind: 'object' });
    const calls = vi.mocked(console.error).mock.calls;
    expect(calls).toHaveLength(2);
    expect(String(calls[0][0])).toMatch(/^\[.+\] \[DEBUG\] \[decode\] Decoded JSON document$/);
    expect(calls[1][0]).toBe(JSON.stringify({ kind: 'object' }, null, 2));
  });

  it('prints warnings when enabled', () => {
    vi.stubEnv('JSON_TO_STRUCT_DEBUG', '1');
    logWarning('inference', 'Ambiguous field', new Error('boom'));
    const calls = vi.mocked(console.error).mock.calls;
    expect(String(calls[0][0])).toMatch(/\[WARN\] \[inference\] Ambiguous field$/);
    expect(calls[1][0]).toBe('Error: boom');
  });

  it('always prints errors', () => {
    vi.stubEnv('JSON_TO_STRUCT_DEBUG', '0');
    logError('cli', 'Unexpected failure');
    expect(console.error).toHaveBeenCalledTimes(1);
    expect(String(vi.mocked(console.error).mock.calls[0][0])).toMatch(/\[ERROR\] \[cli\] Unexpected failure$/);
  });
});
