import { describe, it, expect } from 'vitest';
import {
  BftSimError,
  BftSimErrorCode,
  errorMessage,
  formatError,
} from './errors';

describe('BftSimError', () => {
  it('carries code, message and name', () => {
    const err = new BftSimError(BftSimErrorCode.INVALID_QUORUM, 'quorum 9 exceeds 7 validators');
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe('BftSimError');
    expect(err.code).toBe('BFTSIM_E102');
    expect(err.message).toBe('quorum 9 exceeds 7 validators');
    expect(err.hint).toBeUndefined();
    expect(err.context).toBeUndefined();
  });

  it('keeps hint, context and cause', () => {
    const cause = new Error('root');
    const err = new BftSimError(BftSimErrorCode.ROUND_FAILED, 'round 1 failed', {
      hint: 'check the round script',
      context: { view: 1 },
      cause,
    });
    expect(err.hint).toBe('check the round script');
    expect(err.context).toEqual({ view: 1 });
    expect(err.cause).toBe(cause);
  });

  it('toJSON omits absent optional fields', () => {
    const err = new BftSimError(BftSimErrorCode.UNKNOWN_LEADER, 'leader Q is not a validator');
    expect(err.toJSON()).toEqual({ code: 'BFTSIM_E103', message: 'leader Q is not a validator' });
  });

  it('toJSON includes hint and context when present', () => {
    const err = new BftSimError(BftSimErrorCode.INVALID_FAULT_BOUND, 'too many faults', {
      hint: 'lower f',
      context: { f: 3, max: 2 },
    });
    expect(err.toJSON()).toEqual({
      code: 'BFTSIM_E101',
      message: 'too many faults',
      hint: 'lower f',
      context: { f: 3, max: 2 },
    });
  });
});

describe('formatError', () => {
  it('renders code and message on one line without a hint', () => {
    const err = new BftSimError(BftSimErrorCode.INVALID_OPTION, '--validators needs a value');
    expect(formatError(err)).toBe('[BFTSIM_E401] --validators needs a value');
  });

  it('appends the hint on its own line', () => {
    const err = new BftSimError(BftSimErrorCode.INVALID_OPTION, '--validators needs a value', {
      hint: 'Pass an integer between 4 and 13',
    });
    expect(formatError(err)).toBe(
      '[BFTSIM_E401] --validators needs a value\nHint: Pass an integer between 4 and 13',
    );
  });
});

describe('errorMessage', () => {
  it('uses the message of Error instances', () => {
    expect(errorMessage(new TypeError('bad'))).toBe('bad');
  });

  it('stringifies anything else', () => {
    expect(errorMessage(42)).toBe('42');
    expect(errorMessage(undefined)).toBe('undefined');
  });
});
