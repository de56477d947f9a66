/**
 * Failure Classifier Tests
 */

import {
  FailureType,
  classifyFailure,
  describeError,
  toRouteError,
} from '../failure.classifier';
import { ConnectivityError, ProtocolError } from '../../errors';
import { SocksClientError, SystemError } from '../../../__tests__/helpers/mocks';

describe('classifyFailure', () => {
  it.each(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'EHOSTUNREACH', 'ENOTFOUND', 'ECONNABORTED'])(
    'should treat %s as a retryable connectivity failure',
    (code) => {
      const failure = classifyFailure(new SystemError(`request failed with ${code}`, code));

      expect(failure).toEqual({
        type: FailureType.CONNECTIVITY,
        reason: `request failed with ${code}`,
        code,
        retryable: true,
        socks: false,
      });
    }
  );

  it.each(['ERR_BAD_RESPONSE', 'ERR_FR_TOO_MANY_REDIRECTS', 'ERR_INVALID_URL', 'HPE_INVALID_CONSTANT'])(
    'should treat %s as a protocol failure',
    (code) => {
      const failure = classifyFailure(new SystemError('bad exchange', code));

      expect(failure.type).toBe(FailureType.PROTOCOL);
      expect(failure.retryable).toBe(false);
    }
  );

  it('should flag SOCKS client errors as connectivity', () => {
    const failure = classifyFailure(new SocksClientError('Proxy connection timed out'));

    expect(failure).toMatchObject({ type: FailureType.CONNECTIVITY, code: 'SOCKS', socks: true });
  });

  it('should read the code from the cause chain', () => {
    const error = new Error('request failed', { cause: new SystemError('read ECONNRESET', 'ECONNRESET') });

    expect(classifyFailure(error)).toMatchObject({ type: FailureType.CONNECTIVITY, code: 'ECONNRESET' });
  });

  it('should keep the kind of an already typed error', () => {
    expect(classifyFailure(new ProtocolError('bad body')).type).toBe(FailureType.PROTOCOL);
    expect(classifyFailure(new ConnectivityError('gateway down')).type).toBe(FailureType.CONNECTIVITY);
  });

  it('should fall back to the message when no code is present', () => {
    expect(classifyFailure(new Error('socket hang up')).type).toBe(FailureType.CONNECTIVITY);
    expect(classifyFailure(new Error('Unexpected end of JSON input')).type).toBe(FailureType.PROTOCOL);
  });

  it('should default unknown failures to connectivity', () => {
    const failure = classifyFailure('something odd');

    expect(failure).toEqual({
      type: FailureType.CONNECTIVITY,
      reason: 'something odd',
      code: undefined,
      retryable: true,
      socks: false,
    });
  });
});

describe('SOCKS setup failures', () => {
  it('should flag SOCKS errors by name or message anywhere in the chain', () => {
    expect(classifyFailure(new SocksClientError('Proxy rejected connection')).socks).toBe(true);
    expect(classifyFailure(new Error('wrapped', { cause: new Error('Socks5 handshake failed') })).socks).toBe(true);
  });

  it('should flag a refused connection once the SOCKS client has wrapped it', () => {
    const refused = new SocksClientError('connect ECONNREFUSED 10.0.0.3:1080');

    expect(classifyFailure(refused)).toMatchObject({ type: FailureType.CONNECTIVITY, socks: true, retryable: true });
  });

  it('should not flag other failures', () => {
    expect(classifyFailure(new SystemError('connect ECONNREFUSED', 'ECONNREFUSED')).socks).toBe(false);
  });
});

describe('toRouteError', () => {
  it('should wrap connectivity failures with the proxy used', () => {
    const cause = new SystemError('connect ECONNREFUSED 10.0.0.1:8080', 'ECONNREFUSED');

    const error = toRouteError(cause, 'http://10.0.0.1:8080');

    expect(error).toBeInstanceOf(ConnectivityError);
    expect(error.message).toBe('connect ECONNREFUSED 10.0.0.1:8080 (via http://10.0.0.1:8080)');
    expect(error.proxyUsed).toBe('http://10.0.0.1:8080');
    expect(error.cause).toBe(cause);
  });

  it('should wrap protocol failures', () => {
    const error = toRouteError(new SystemError('Parse Error', 'HPE_INVALID_CHUNK_SIZE'));

    expect(error).toBeInstanceOf(ProtocolError);
    expect(error.message).toBe('Parse Error');
  });

  it('should pass typed errors through unchanged', () => {
    const original = new ProtocolError('already typed');

    expect(toRouteError(original, 'http://10.0.0.1:8080')).toBe(original);
  });
});

describe('describeError', () => {
  it('should use the message of errors and stringify anything else', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError(42)).toBe('42');
  });
});
