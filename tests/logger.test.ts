import { logWarning, logInfo, logData, logError } from '../src/logger';

describe('logger', () => {
  let consoleLogSpy: jest.SpyInstance;

  beforeEach(() => {
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();
  });

  describe('logWarning', () => {
    it('logs in yellow', () => {
      logWarning('[warning] TYPE_MAPPING_ERROR User.avatar: rendered as any');
      expect(consoleLogSpy).toHaveBeenCalledWith(
        '\x1b[33m[warning] TYPE_MAPPING_ERROR User.avatar: rendered as any\x1b[0m'
      );
    });
  });

  describe('logInfo', () => {
    it('logs in green', () => {
      logInfo('Generated 2 files');
      expect(consoleLogSpy).toHaveBeenCalledWith('\x1b[32mGenerated 2 files\x1b[0m');
    });
  });

  describe('logData', () => {
    it('logs a title and a string', () => {
      logData('Route table', 'users');
      expect(consoleLogSpy).toHaveBeenCalledTimes(3);
      expect(consoleLogSpy).toHaveBeenNthCalledWith(1, '');
      expect(consoleLogSpy).toHaveBeenNthCalledWith(2, '\x1b[36m== Route table ==\x1b[0m');
      expect(consoleLogSpy).toHaveBeenNthCalledWith(3, 'users');
    });

    it('pretty-prints objects', () => {
      const group = { name: 'users', prefix: '/users' };
      logData('Group', group);
      expect(consoleLogSpy).toHaveBeenNthCalledWith(3, JSON.stringify(group, null, 2));
    });

    it('replaces circular references', () => {
      const model: Record<string, unknown> = { name: 'Category' };
      model.parent = model;

      logData('Model', model);
      expect(consoleLogSpy).toHaveBeenNthCalledWith(
        3,
        JSON.stringify({ name: 'Category', parent: '[Circular]' }, null, 2)
      );
    });

    it('prints an empty title for undefined', () => {
      logData(undefined, { ok: true });
      expect(consoleLogSpy).toHaveBeenNthCalledWith(2, '\x1b[36m==  ==\x1b[0m');
    });

    it('prints only the title without data', () => {
      logData('Empty');
      expect(consoleLogSpy).toHaveBeenCalledTimes(2);
    });

    it('does not print null data', () => {
      logData('Null', null);
      expect(consoleLogSpy).toHaveBeenCalledTimes(2);
    });
  });

  describe('logError', () => {
    it('logs the stack in red', () => {
      const error = new Error('write failed');
      logError(error);
      expect(consoleLogSpy).toHaveBeenCalledWith('\x1b[31m' + error.stack + '\x1b[0m');
    });

    it('logs a title before the error', () => {
      const error = new Error('write failed');
      logError(error, 'Generation');
      expect(consoleLogSpy).toHaveBeenNthCalledWith(1, '');
      expect(consoleLogSpy).toHaveBeenNthCalledWith(2, '== Generation ==');
      expect(consoleLogSpy).toHaveBeenNthCalledWith(3, '\x1b[31m' + error.stack + '\x1b[0m');
    });

    it('skips an empty title', () => {
      const error = new Error('write failed');
      logError(error, '');
      expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    });

    it('logs an Error cause', () => {
      const cause = new Error('EACCES');
      const error = new Error('write failed', { cause });

      logError(error);
      expect(consoleLogSpy).toHaveBeenCalledWith('\x1b[31m== Error Cause ==\x1b[0m');
      expect(consoleLogSpy).toHaveBeenCalledWith('\x1b[31m' + cause.stack + '\x1b[0m');
    });

    it('logs the message of a cause without a stack', () => {
      const cause = new Error('EACCES');
      Reflect.set(cause, 'stack', undefined);
      const error = new Error('write failed', { cause });

      logError(error);
      expect(consoleLogSpy).toHaveBeenCalledWith('\x1b[31mEACCES\x1b[0m');
    });

    it('serializes a cause that is not an Error', () => {
      const cause = { code: 'EACCES' };
      const error = new Error('write failed', { cause });

      logError(error);
      expect(consoleLogSpy).toHaveBeenCalledWith(
        '\x1b[31m' + JSON.stringify(cause, null, 2) + '\x1b[0m'
      );
    });

    it('logs the message of an error without a stack', () => {
      const error = new Error('write failed');
      Reflect.set(error, 'stack', undefined);

      logError(error);
      expect(consoleLogSpy).toHaveBeenCalledWith('\x1b[31mwrite failed\x1b[0m');
    });

    it('sends non-Error values to console.error', () => {
      const consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation();
      logError('plain failure');
      expect(consoleErrorSpy).toHaveBeenCalledWith('\x1b[31mplain failure\x1b[0m');
      consoleErrorSpy.mockRestore();
    });
  });

  describe('browser output', () => {
    afterEach(() => {
      Reflect.deleteProperty(globalThis, 'window');
    });

    it('logs plain text when window exists', () => {
      Reflect.set(globalThis, 'window', {});
      logWarning('plain');
      expect(consoleLogSpy).toHaveBeenCalledWith('plain');
    });

    it('logs colored text without window', () => {
      logWarning('colored');
      expect(consoleLogSpy).toHaveBeenCalledWith('\x1b[33mcolored\x1b[0m');
    });
  });
});
