import { afterEach, describe, expect, it, vi } from 'vitest';
import { describeFailure, reportFailure } from '../errors';
import { SHARE_HINT } from '../config/defaults';

describe('describeFailure', () => {
  it('keeps informative messages', () => {
    expect(describeFailure(new Error('quota exceeded'))).toBe('quota exceeded');
  });

  it('falls back to the sharing hint for empty or one-character messages', () => {
    expect(describeFailure(new Error(''))).toBe(SHARE_HINT);
    expect(describeFailure(new Error('x'))).toBe(SHARE_HINT);
    expect(describeFailure(undefined)).toBe(SHARE_HINT);
  });

  it('stringifies non-errors', () => {
    expect(describeFailure('plain text')).toBe('plain text');
  });
});

describe('reportFailure', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs a structured record and returns the sheet message', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const message = reportFailure('ERROR_TAG', 'sheet-url', new Error(''));

    expect(message).toBe(SHARE_HINT);
    expect(error).toHaveBeenLastCalledWith(
      `ERROR_TAG: {"worksheet_url":"sheet-url","status":"ERROR_TAG","message":"${SHARE_HINT}","success":false}`
    );
  });
});
