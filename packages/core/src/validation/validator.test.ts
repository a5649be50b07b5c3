import { DetailedValidationError } from '../errors';
import { Schemas, SchemaValidationCache } from '../schemas';
import { assertValid, validateDetailed } from './validator';

describe('validator', () => {
  describe('validateDetailed', () => {
    it('should return no errors for valid data', () => {
      expect(validateDetailed(Schemas.SchedulerConfig, { poolSize: 2 })).toEqual({ isValid: true, errors: [] });
    });

    it('should report every failing field with its value', () => {
      const result = validateDetailed(Schemas.SchedulerConfig, { poolSize: 0, logLevel: 'loud' });

      expect(result.isValid).toBe(false);
      expect(result.errors).toEqual([
        { field: 'poolSize', message: 'must be >= 1', value: 0 },
        { field: 'logLevel', message: 'must be equal to one of the allowed values', value: 'loud' },
      ]);
    });
  });

  describe('assertValid', () => {
    it('should throw a DetailedValidationError naming the subject', () => {
      expect(() => assertValid('SchedulerConfig', Schemas.SchedulerConfig, { timeUnitMs: -1 }))
        .toThrow(new DetailedValidationError('SchedulerConfig', [
          { field: 'timeUnitMs', message: 'must be >= 0', value: -1 },
        ]));
    });

    it('should pass valid data through', () => {
      expect(() => assertValid('SchedulerConfig', Schemas.SchedulerConfig, {})).not.toThrow();
    });
  });

  describe('SchemaValidationCache', () => {
    beforeEach(() => {
      SchemaValidationCache.clearCache();
    });

    it('should compile each schema once', () => {
      const first = SchemaValidationCache.getValidatorFromSchema(Schemas.TaskDescription);
      const second = SchemaValidationCache.getValidatorFromSchema(Schemas.TaskDescription);
      SchemaValidationCache.getValidatorFromSchema(Schemas.TaskDocument);

      expect(second).toBe(first);
      expect(SchemaValidationCache.getCacheStats()).toEqual({ cachedSchemas: 2 });
    });
  });
});
