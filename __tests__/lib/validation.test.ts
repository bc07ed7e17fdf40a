/**
 * Tests for Validation Utilities
 */

import {
  isRecord,
  validateBoolean,
  validateEnum,
  validateNumber,
  validateOrderType,
  validatePositiveNumber,
  validateString,
  validateSymbol,
  validateSymbolList,
} from '@/lib/validation';

describe('Validation Utilities', () => {
  describe('isRecord', () => {
    it('should accept plain objects only', () => {
      expect(isRecord({ a: 1 })).toBe(true);
      expect(isRecord([])).toBe(false);
      expect(isRecord(null)).toBe(false);
      expect(isRecord('x')).toBe(false);
    });
  });

  describe('validateString', () => {
    it('should accept valid string', () => {
      const result = validateString('hello', 'field');
      expect(result.valid).toBe(true);
      if (result.valid) expect(result.value).toBe('hello');
    });

    it('should reject non-string', () => {
      const result = validateString(123, 'field');
      expect(result.valid).toBe(false);
      if (!result.valid) expect(result.error).toBe('field must be a string');
    });

    it('should enforce length and pattern', () => {
      expect(validateString('ab', 'f', { minLength: 3 }).valid).toBe(false);
      expect(validateString('toolong', 'f', { maxLength: 5 }).valid).toBe(false);
      const result = validateString('abc123', 'f', { pattern: /^[a-z]+$/ });
      if (!result.valid) expect(result.error).toBe('f has invalid format');
      expect(result.valid).toBe(false);
    });
  });

  describe('validateNumber', () => {
    it('should reject NaN, Infinity and strings', () => {
      expect(validateNumber(NaN, 'f').valid).toBe(false);
      expect(validateNumber(Infinity, 'f').valid).toBe(false);
      expect(validateNumber('42', 'f').valid).toBe(false);
    });

    it('should enforce min, max and integer', () => {
      const min = validateNumber(5, 'f', { min: 10 });
      if (!min.valid) expect(min.error).toBe('f must be at least 10');
      const max = validateNumber(15, 'f', { max: 10 });
      if (!max.valid) expect(max.error).toBe('f must be at most 10');
      const int = validateNumber(3.14, 'f', { integer: true });
      if (!int.valid) expect(int.error).toBe('f must be an integer');
      expect([min.valid, max.valid, int.valid]).toEqual([false, false, false]);
    });
  });

  describe('validatePositiveNumber', () => {
    it('should reject zero unless allowed', () => {
      expect(validatePositiveNumber(0, 'f').valid).toBe(false);
      expect(validatePositiveNumber(0, 'f', { allowZero: true }).valid).toBe(true);
      expect(validatePositiveNumber(-1, 'f', { allowZero: true }).valid).toBe(false);
    });
  });

  describe('validateBoolean', () => {
    it('should accept booleans only', () => {
      expect(validateBoolean(false, 'f')).toEqual({ valid: true, value: false });
      expect(validateBoolean('true', 'f').valid).toBe(false);
    });
  });

  describe('validateEnum', () => {
    it('should narrow to the allowed literal', () => {
      const result = validateEnum('macd', 'kind', ['rsi', 'macd'] as const);
      expect(result).toEqual({ valid: true, value: 'macd' });
    });

    it('should list allowed values on failure', () => {
      const result = validateEnum('momentum', 'kind', ['rsi', 'macd'] as const);
      expect(result).toEqual({ valid: false, error: 'kind must be one of: rsi, macd' });
    });
  });

  describe('validateSymbol', () => {
    it('should uppercase perp symbols', () => {
      expect(validateSymbol('btc')).toEqual({ valid: true, value: 'BTC' });
      expect(validateSymbol('1000pepe')).toEqual({ valid: true, value: '1000PEPE' });
      expect(validateSymbol('eth-perp')).toEqual({ valid: true, value: 'ETH-PERP' });
    });

    it('should reject malformed symbols', () => {
      expect(validateSymbol('').valid).toBe(false);
      expect(validateSymbol('BTC USD').valid).toBe(false);
      expect(validateSymbol('-BTC').valid).toBe(false);
      expect(validateSymbol('A'.repeat(21)).valid).toBe(false);
    });
  });

  describe('validateOrderType', () => {
    it('should accept exchange literals', () => {
      expect(validateOrderType('limit', 'execution.entryOrderType')).toEqual({ valid: true, value: 'limit' });
      const bad = validateOrderType('stop', 'execution.entryOrderType');
      if (!bad.valid) expect(bad.error).toBe('execution.entryOrderType must be one of: market, limit');
    });
  });

  describe('validateSymbolList', () => {
    it('should uppercase and deduplicate', () => {
      expect(validateSymbolList(['btc', 'ETH', 'BTC'], 'symbols')).toEqual({ valid: true, value: ['BTC', 'ETH'] });
    });

    it('should reject empty lists and name the bad index', () => {
      expect(validateSymbolList([], 'symbols')).toEqual({ valid: false, error: 'symbols must be a non-empty list' });
      const result = validateSymbolList(['BTC', 7], 'symbols');
      if (!result.valid) expect(result.error).toBe('symbols[1] must be a string');
      expect(result.valid).toBe(false);
    });
  });
});
