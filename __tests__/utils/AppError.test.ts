import { AppError } from '../../src/utils/AppError';
import { RuleTableError } from '../../src/classification';

describe('AppError', () => {
  describe('constructor', () => {
    it('should create an error with message and status code', () => {
      const error = new AppError('Test error', 400);

      expect(error.message).toBe('Test error');
      expect(error.statusCode).toBe(400);
      expect(error.isOperational).toBe(true);
      expect(error.details).toBeUndefined();
    });

    it('should create a non-operational error', () => {
      const error = new AppError('Internal error', 500, false);

      expect(error.isOperational).toBe(false);
    });

    it('should be an instance of Error', () => {
      const error = new AppError('Test', 400);

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(AppError);
      expect(error.name).toBe('AppError');
    });

    it('should capture stack trace', () => {
      const error = new AppError('Test', 400);

      expect(error.stack).toBeDefined();
    });

    it('should keep details', () => {
      const error = new AppError('Bad', 400, true, [{ field: 'text' }]);

      expect(error.details).toEqual([{ field: 'text' }]);
    });
  });

  describe('subclasses', () => {
    it('should keep the subclass identity', () => {
      const error = new RuleTableError([{ table: 'charge-patterns', index: 2, path: 'pattern', message: 'invalid regex' }]);

      expect(error).toBeInstanceOf(RuleTableError);
      expect(error).toBeInstanceOf(AppError);
      expect(error.name).toBe('RuleTableError');
      expect(error.statusCode).toBe(422);
      expect(error.message).toBe('Invalid rule table: charge-patterns[2].pattern: invalid regex');
    });

    it('should count the issues beyond the first', () => {
      const error = new RuleTableError([
        { table: 'equipment-aliases', message: 'first' },
        { table: 'material-aliases', message: 'second' },
        { table: 'material-aliases', message: 'third' },
      ]);

      expect(error.message).toBe('Invalid rule table: equipment-aliases: first (+2 more)');
      expect(error.issues).toHaveLength(3);
      expect(error.details).toBe(error.issues);
    });
  });

  describe('static methods', () => {
    it('should create bad request error', () => {
      const error = AppError.badRequest('Invalid input');

      expect(error.statusCode).toBe(400);
      expect(error.message).toBe('Invalid input');
    });

    it('should create bad request error with details', () => {
      const error = AppError.badRequest('Validation failed', [{ field: 'lineItems', message: 'Required' }]);

      expect(error.details).toEqual([{ field: 'lineItems', message: 'Required' }]);
    });

    it('should create not found error', () => {
      const error = AppError.notFound();

      expect(error.statusCode).toBe(404);
      expect(error.message).toBe('Resource not found');
    });

    it('should create not found error with custom message', () => {
      const error = AppError.notFound('Batch not found');

      expect(error.statusCode).toBe(404);
      expect(error.message).toBe('Batch not found');
    });

    it('should create unprocessable error', () => {
      const error = AppError.unprocessable('Bad table');

      expect(error.statusCode).toBe(422);
      expect(error.isOperational).toBe(true);
    });

    it('should create service unavailable error', () => {
      const error = AppError.serviceUnavailable();

      expect(error.statusCode).toBe(503);
      expect(error.message).toBe('Service unavailable');
    });

    it('should create internal error as non-operational', () => {
      const error = AppError.internal();

      expect(error.statusCode).toBe(500);
      expect(error.isOperational).toBe(false);
    });
  });
});
