import { isNetworkError } from '../src/utils/errorHandling';
import { ConfigError, FlexError, FlexErrorCode, OutOfRangeError } from '../src/utils/errors';

describe('errors', () => {
  test('subclasses keep their name and code', () => {
    const err = new OutOfRangeError(2, 0, 1, 'Volume fraction');
    expect(err).toBeInstanceOf(FlexError);
    expect(err.name).toBe('OutOfRangeError');
    expect(err.code).toBe(FlexErrorCode.OUT_OF_RANGE);
  });

  test('toJSON carries the context', () => {
    const json = new ConfigError(['port: Required']).toJSON();
    expect(json.name).toBe('ConfigError');
    expect(json.code).toBe(FlexErrorCode.INVALID_CONFIG);
    expect(json.message).toBe('Invalid connection configuration: port: Required');
    expect(json.context).toEqual({ issues: ['port: Required'] });
  });

  test('isNetworkError', () => {
    const unreachable = Object.assign(new Error('send failed'), { code: 'EHOSTUNREACH' });
    expect(isNetworkError(unreachable)).toBe(true);
    expect(isNetworkError(new Error('connect ENETUNREACH 10.0.0.2:4000'))).toBe(true);
    expect(isNetworkError(new Error('boom'))).toBe(false);
    expect(isNetworkError('EHOSTUNREACH')).toBe(false);
  });
});
