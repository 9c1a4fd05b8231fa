import { describe, it, expect } from 'vitest';
import { isValidDateISO, isValidUrl, ValidationError } from '../../src/util/validation.js';

describe('validation', () => {
  describe('isValidDateISO', () => {
    it('should validate correct ISO date format', () => {
      expect(isValidDateISO('2025-01-13')).toBe(true);
      expect(isValidDateISO('2024-12-31')).toBe(true);
      expect(isValidDateISO('2024-02-29')).toBe(true);
    });

    it('should reject invalid formats', () => {
      expect(isValidDateISO('2025/01/13')).toBe(false);
      expect(isValidDateISO('01-13-2025')).toBe(false);
      expect(isValidDateISO('2025-1-13')).toBe(false);
      expect(isValidDateISO('invalid')).toBe(false);
    });

    it('should reject dates that do not exist', () => {
      expect(isValidDateISO('2025-13-01')).toBe(false); // Invalid month
      expect(isValidDateISO('2025-02-30')).toBe(false); // Invalid day
      expect(isValidDateISO('2025-02-29')).toBe(false); // Not a leap year
    });
  });

  describe('isValidUrl', () => {
    it('should validate correct URLs', () => {
      expect(isValidUrl('http://localhost:8000')).toBe(true);
      expect(isValidUrl('https://api.example.com')).toBe(true);
    });

    it('should reject invalid URLs', () => {
      expect(isValidUrl('not-a-url')).toBe(false);
      expect(isValidUrl('')).toBe(false);
      expect(isValidUrl('ftp://files.example.com')).toBe(false);
    });
  });

  describe('ValidationError', () => {
    it('should create error with message and field', () => {
      const error = new ValidationError('Invalid input', 'fieldName');
      expect(error.message).toBe('Invalid input');
      expect(error.field).toBe('fieldName');
      expect(error.name).toBe('ValidationError');
      expect(error.code).toBe('VALIDATION_ERROR');
    });
  });
});
