import { AppError } from '../../src/utils/AppError';

describe('AppError', () => {
  describe('constructor', () => {
    it('should create an error with message, code and exit code', () => {
      const error = new AppError('Test error', 'INVALID_INPUT', 3);

      expect(error.message).toBe('Test error');
      expect(error.code).toBe('INVALID_INPUT');
      expect(error.exitCode).toBe(3);
      expect(error.isOperational).toBe(true);
    });

    it('should default to exit code 1', () => {
      const error = new AppError('Test', 'INTERNAL');

      expect(error.exitCode).toBe(1);
    });

    it('should create a non-operational error', () => {
      const error = new AppError('Internal error', 'INTERNAL', 1, false);

      expect(error.isOperational).toBe(false);
    });

    it('should be an instance of Error', () => {
      const error = new AppError('Test', 'NOT_FOUND');

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(AppError);
      expect(error.name).toBe('AppError');
    });

    it('should capture stack trace', () => {
      const error = new AppError('Test', 'NOT_FOUND');

      expect(error.stack).toBeDefined();
    });
  });

  describe('static methods', () => {
    it('should create invalid config error', () => {
      const error = AppError.invalidConfig('fuzzyThreshold must be between 0 and 1');

      expect(error.code).toBe('INVALID_CONFIG');
      expect(error.exitCode).toBe(2);
      expect(error.message).toBe('fuzzyThreshold must be between 0 and 1');
    });

    it('should create invalid input error', () => {
      const error = AppError.invalidInput('Missing columns in ref.csv: Sex');

      expect(error.code).toBe('INVALID_INPUT');
      expect(error.exitCode).toBe(3);
    });

    it('should create not found error', () => {
      const error = AppError.notFound();

      expect(error.code).toBe('NOT_FOUND');
      expect(error.exitCode).toBe(4);
      expect(error.message).toBe('File not found');
    });

    it('should create not found error with custom message', () => {
      const error = AppError.notFound('File not found: ref.csv');

      expect(error.message).toBe('File not found: ref.csv');
    });

    it('should create internal error as non-operational', () => {
      const error = AppError.internal();

      expect(error.code).toBe('INTERNAL');
      expect(error.exitCode).toBe(1);
      expect(error.isOperational).toBe(false);
    });
  });
});
