/**
 * Unit Tests — AccessLogService
 *
 * The service is where configuration errors surface (constructor) and where
 * a rendered line is handed to the sink (record). `onLog` is a jest.fn()
 * so each test can see exactly what the sink received.
 */
import {
  AccessLogService,
  createPathSkipper,
  neverSkip,
  type AccessLogOptions,
  type OnLog,
} from '@application/services/AccessLogService';
import { ConfigurationError } from '@shared/errors/AppError';

import { createFakeContext } from '../helpers/fakeRenderContext';

describe('AccessLogService', () => {
  let onLog: jest.MockedFunction<OnLog>;

  beforeEach(() => {
    onLog = jest.fn();
  });

  describe('constructor', () => {
    it('should throw a ConfigurationError for an empty format', () => {
      expect(() => new AccessLogService({ format: '', onLog })).toThrow(ConfigurationError);
      expect(() => new AccessLogService({ format: '', onLog })).toThrow(
        'Access logger requires a format',
      );
    });

    it('should throw a ConfigurationError when onLog is missing', () => {
      const options = { format: '{method}' } as AccessLogOptions;

      expect(() => new AccessLogService(options)).toThrow(ConfigurationError);
      expect(() => new AccessLogService(options)).toThrow('Access logger requires an onLog function');
    });

    it('should compile the format once at construction', () => {
      const service = new AccessLogService({ format: '{method} {status}', onLog });

      expect(service.compiled).toEqual([
        { kind: 'field', text: 'method' },
        { kind: 'literal', text: ' ' },
        { kind: 'field', text: 'status' },
      ]);
      expect(service.compiled).toBe(service.compiled);
    });
  });

  describe('record()', () => {
    beforeEach(() => {
      jest.useFakeTimers({ now: new Date(Date.UTC(2024, 2, 5, 9, 7, 3)) });
    });

    afterEach(() => {
      jest.useRealTimers();
    });

    it('should pass the rendered line and the context to onLog', () => {
      const service = new AccessLogService({ format: '{method} {path} {status}', onLog });
      const ctx = createFakeContext({ method: 'POST', path: '/orders', statusCode: 201 });

      const line = service.record(ctx, Date.now());

      expect(line).toBe('POST /orders 201');
      expect(onLog).toHaveBeenCalledTimes(1);
      expect(onLog).toHaveBeenCalledWith('POST /orders 201', ctx);
    });

    it('should measure latency from the given start time', () => {
      const service = new AccessLogService({ format: '{latency-ms}ms', onLog });

      service.record(createFakeContext(), Date.now() - 42);

      expect(onLog).toHaveBeenCalledWith('42ms', expect.anything());
    });

    it('should keep renders of successive requests independent', () => {
      const service = new AccessLogService({ format: '{method} {~sid}', onLog });

      service.record(createFakeContext({ method: 'GET', cookies: { sid: 'a' } }), Date.now());
      service.record(createFakeContext({ method: 'PUT' }), Date.now());

      expect(onLog.mock.calls.map(([line]) => line)).toEqual(['GET a', 'PUT ']);
    });
  });

  describe('shouldSkip()', () => {
    it('should never skip without a skipper', () => {
      const service = new AccessLogService({ format: '{method}', onLog });

      expect(service.shouldSkip(createFakeContext())).toBe(false);
    });

    it('should delegate to the configured skipper', () => {
      const skipper = jest.fn((ctx: { method: string }) => ctx.method === 'OPTIONS');
      const service = new AccessLogService({ format: '{method}', onLog, skipper });

      expect(service.shouldSkip(createFakeContext({ method: 'OPTIONS' }))).toBe(true);
      expect(service.shouldSkip(createFakeContext({ method: 'GET' }))).toBe(false);
      expect(skipper).toHaveBeenCalledTimes(2);
    });
  });
});

describe('createPathSkipper()', () => {
  it('should skip only the listed paths', () => {
    const skipper = createPathSkipper(['/api/v1/health', '/metrics']);

    expect(skipper(createFakeContext({ path: '/api/v1/health' }))).toBe(true);
    expect(skipper(createFakeContext({ path: '/metrics' }))).toBe(true);
    expect(skipper(createFakeContext({ path: '/api/v1/health/deep' }))).toBe(false);
  });

  it('should treat an empty path as /', () => {
    expect(createPathSkipper(['/'])(createFakeContext({ path: '' }))).toBe(true);
  });

  it('should return the never-skip predicate for an empty list', () => {
    expect(createPathSkipper([])).toBe(neverSkip);
  });
});
