import {
  ConfigError,
  DescriptorSourceError,
  DiagnosticCollector,
  DiscoveryValidationError,
  ErrorCode,
  GenerationError,
  IOError,
  OutputCollisionError,
  TypeMappingError,
  describeError,
  formatDiagnostics,
  isFatalError,
  isTypedRoutesError,
} from '../src/errors';

describe('errors', () => {
  describe('fatality', () => {
    test('configuration, source, discovery and collision errors are fatal', () => {
      expect(new ConfigError('bad').fatal).toBe(true);
      expect(new DescriptorSourceError('down').fatal).toBe(true);
      expect(
        new DiscoveryValidationError('missing', { file: 'a/_route.py', segment: '[id]' }).fatal
      ).toBe(true);
      expect(new OutputCollisionError('out.ts', ['a', 'b']).fatal).toBe(true);
    });

    test('mapping, generation and write errors are not fatal', () => {
      expect(new TypeMappingError('no rule').fatal).toBe(false);
      expect(new GenerationError('broken').fatal).toBe(false);
      expect(new IOError('out.ts', new Error('EACCES')).fatal).toBe(false);
    });

    test('isFatalError treats foreign errors as fatal', () => {
      expect(isFatalError(new Error('boom'))).toBe(true);
      expect(isFatalError(new GenerationError('broken'))).toBe(false);
    });
  });

  describe('error details', () => {
    test('ConfigError keeps the failing option paths', () => {
      const error = new ConfigError('Invalid configuration', ['output.strategy: bad value']);
      expect(error.code).toBe(ErrorCode.CONFIG);
      expect(error.issues).toEqual(['output.strategy: bad value']);
      expect(error.details).toEqual({ issues: ['output.strategy: bad value'] });
      expect(error.name).toBe('ConfigError');
    });

    test('DiscoveryValidationError exposes its context', () => {
      const error = new DiscoveryValidationError('missing user_id', {
        file: 'users/[user_id]/_route.py',
        segment: '[user_id]',
        route: 'get_user (GET /users/{user_id})',
        parameter: 'user_id',
      });
      expect(error.file).toBe('users/[user_id]/_route.py');
      expect(error.segment).toBe('[user_id]');
      expect(error.route).toBe('get_user (GET /users/{user_id})');
      expect(error.parameter).toBe('user_id');
    });

    test('OutputCollisionError names the path and its claimants', () => {
      const error = new OutputCollisionError('.typed-routes/users.ts', ['users', 'users.py']);
      expect(error.message).toBe(
        'Output collision at .typed-routes/users.ts: claimed by users, users.py'
      );
      expect(error.claimants).toEqual(['users', 'users.py']);
    });

    test('IOError describes its cause', () => {
      const cause = new Error('EACCES: permission denied');
      const error = new IOError('.typed-routes/runtime.ts', cause);
      expect(error.message).toBe('Failed to write .typed-routes/runtime.ts: EACCES: permission denied');
      expect(error.cause).toBe(cause);
    });

    test('isTypedRoutesError recognises only generator errors', () => {
      expect(isTypedRoutesError(new GenerationError('x'))).toBe(true);
      expect(isTypedRoutesError(new Error('x'))).toBe(false);
    });
  });

  describe('describeError', () => {
    test('handles errors, strings and other values', () => {
      expect(describeError(new Error('boom'))).toBe('boom');
      expect(describeError('boom')).toBe('boom');
      expect(describeError(42)).toBe('42');
    });

    test('reads the message of errors from another realm', () => {
      expect(describeError({ code: 'ENOENT', message: 'no such file' })).toBe('no such file');
    });
  });

  describe('DiagnosticCollector', () => {
    test('type mapping problems are warnings, everything else errors', () => {
      const collector = new DiagnosticCollector();
      collector.warn('rendered as any: no mapping rule for type "Decimal"', 'Invoice.total');
      collector.report(new GenerationError('broken'), 'users.py#get_user');

      expect(collector.list()).toEqual([
        {
          severity: 'warning',
          code: ErrorCode.TYPE_MAPPING,
          message: 'rendered as any: no mapping rule for type "Decimal"',
          subject: 'Invoice.total',
        },
        {
          severity: 'error',
          code: ErrorCode.GENERATION,
          message: 'broken',
          subject: 'users.py#get_user',
        },
      ]);
    });

    test('drops repeats of the same diagnostic', () => {
      const collector = new DiagnosticCollector();
      collector.warn('rendered as any: x', 'User.avatar');
      collector.warn('rendered as any: x', 'User.avatar');
      collector.warn('rendered as any: x', 'User.banner');
      expect(collector.size).toBe(2);
    });

    test('drain empties the collector', () => {
      const collector = new DiagnosticCollector();
      collector.warn('rendered as any: x', 'User.avatar');

      expect(collector.drain()).toHaveLength(1);
      expect(collector.size).toBe(0);

      collector.warn('rendered as any: x', 'User.avatar');
      expect(collector.size).toBe(1);
    });

    test('formatDiagnostics renders one line each', () => {
      const collector = new DiagnosticCollector();
      collector.warn('rendered as any: x', 'User.avatar');
      expect(formatDiagnostics(collector.list())).toEqual([
        '[warning] TYPE_MAPPING_ERROR User.avatar: rendered as any: x',
      ]);
    });
  });
});
