import { createStudentRecord } from './student_factory';
import { DetailedValidationError } from '../record_schemas/errors';
import type { StudentRecord } from '../record_types';

describe('StudentRecord Factory', () => {
  describe('createStudentRecord', () => {
    it('should return a record with the given fields', () => {
      const result = createStudentRecord({ id: 7, name: 'Grace', age: 31, major: 'Mathematics' });

      expect(result).toEqual({ id: 7, name: 'Grace', age: 31, major: 'Mathematics' });
    });

    it('should return a new object rather than the payload', () => {
      const payload: StudentRecord = { id: 7, name: 'Grace', age: 31, major: 'Mathematics' };

      const result = createStudentRecord(payload);

      expect(result).not.toBe(payload);
    });

    it('should drop properties that are not part of StudentRecord', () => {
      const payload = { id: 7, name: 'Grace', age: 31, major: 'Mathematics', nickname: 'G' };

      const result = createStudentRecord(payload);

      expect(Object.keys(result)).toEqual(['id', 'name', 'age', 'major']);
    });

    it('should throw DetailedValidationError for a fractional id', () => {
      expect(() => createStudentRecord({ id: 1.5, name: 'Grace', age: 31, major: 'Mathematics' }))
        .toThrow(DetailedValidationError);
    });

    it('should summarise every failing field in the message', () => {
      let caught: unknown;
      try {
        createStudentRecord({ id: 1.5, name: 'Grace', age: 2.5, major: 'Mathematics' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(DetailedValidationError);
      if (caught instanceof DetailedValidationError) {
        expect(caught.message).toBe('StudentRecord validation failed: id: must be integer, age: must be integer');
        expect(caught.code).toBe('DETAILED_VALIDATION_ERROR');
        expect(caught.errors.map(error => error.field)).toEqual(['id', 'age']);
      }
    });
  });
});
