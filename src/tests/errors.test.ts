import { errorDetails, errorMessage, GatewayError, isGatewayError } from '../shared/errors';

describe('GatewayError', () => {
  test('1. codes map to their HTTP statuses', () => {
    expect(new GatewayError('UNAUTHORIZED', 'Missing credentials').status).toBe(401);
    expect(new GatewayError('FORBIDDEN', 'Insufficient role permissions').status).toBe(403);
    expect(new GatewayError('UNAVAILABLE', 'Service registry is not loaded yet').status).toBe(503);
    expect(new GatewayError('GATEWAY_TIMEOUT', 'Downstream service timed out').status).toBe(504);
  });

  test('2. is recognised as a gateway error and keeps its cause', () => {
    const cause = new Error('ECONNREFUSED');
    const error = new GatewayError('BAD_GATEWAY', 'Downstream service unreachable', { cause });

    expect(isGatewayError(error)).toBe(true);
    expect(isGatewayError(cause)).toBe(false);
    expect(error.cause).toBe(cause);
  });
});

describe('Error log fields', () => {
  test('3. errors contribute their message and stack', () => {
    const error = new Error('redis down');

    expect(errorDetails(error)).toEqual({ error: 'redis down', stack: error.stack });
    expect(errorDetails(error).stack).toContain('redis down');
  });

  test('4. thrown non-errors are logged as text', () => {
    expect(errorDetails('boom')).toEqual({ error: 'boom' });
    expect(errorMessage(42)).toBe('42');
  });
});
