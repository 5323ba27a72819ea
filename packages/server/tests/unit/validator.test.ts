/**
 * Input Validator Tests
 */

import { describe, it, expect } from 'vitest';
import { InputValidator } from '../../src/security/validator.js';

describe('InputValidator', () => {
  const validator = new InputValidator();

  describe('validateUsername', () => {
    it('should accept a plain name and trim surrounding whitespace', () => {
      expect(validator.validateUsername('  Alice  ')).toEqual({ valid: true, value: 'Alice' });
    });

    it('should reject empty names', () => {
      expect(validator.validateUsername('')).toEqual({ valid: false, error: 'Username cannot be empty' });
      expect(validator.validateUsername('   ')).toEqual({ valid: false, error: 'Username cannot be empty' });
    });

    it('should accept a name at the length limit and reject one past it', () => {
      expect(validator.validateUsername('a'.repeat(50)).valid).toBe(true);
      expect(validator.validateUsername('a'.repeat(51))).toEqual({
        valid: false,
        error: 'Username too long (max 50 characters)',
      });
    });

    it('should count characters outside the basic plane once', () => {
      const emoji = '\u{1F600}';
      expect(validator.validateUsername(emoji.repeat(26))).toEqual({ valid: true, value: emoji.repeat(26) });
      expect(validator.validateUsername(emoji.repeat(51))).toEqual({
        valid: false,
        error: 'Username too long (max 50 characters)',
      });
    });

    it('should honour a custom length limit', () => {
      const strict = new InputValidator({ maxUsernameLength: 5 });
      expect(strict.validateUsername('abcdef')).toEqual({
        valid: false,
        error: 'Username too long (max 5 characters)',
      });
    });

    it('should reject the frame separator and roster delimiters', () => {
      for (const name of ['Al|ce', 'Al,ce', 'Al(ce', 'Alce)']) {
        expect(validator.validateUsername(name)).toEqual({
          valid: false,
          error: 'Username cannot contain | , ( or )',
        });
      }
    });

    it('should reject control characters', () => {
      expect(validator.validateUsername('Al\tice')).toEqual({
        valid: false,
        error: 'Username contains control characters',
      });
      expect(validator.validateUsername('Al\u0000ice').valid).toBe(false);
    });

    it('should reject inner spaces', () => {
      expect(validator.validateUsername('Al ice')).toEqual({
        valid: false,
        error: 'Username cannot contain spaces',
      });
    });

    it('should reject reserved names regardless of case', () => {
      expect(validator.validateUsername('ADMIN')).toEqual({ valid: false, error: "Username 'ADMIN' is reserved" });
      expect(validator.validateUsername('Server').valid).toBe(false);
      expect(validator.validateUsername('system').valid).toBe(false);
    });

    it('should accept non-ASCII names', () => {
      expect(validator.validateUsername('Zoë')).toEqual({ valid: true, value: 'Zoë' });
    });
  });

  describe('validateMessage', () => {
    it('should collapse whitespace and trim', () => {
      expect(validator.validateMessage('  hello    world ')).toEqual({ valid: true, value: 'hello world' });
    });

    it('should turn control characters into spaces', () => {
      expect(validator.validateMessage('a\u0007b')).toEqual({ valid: true, value: 'a b' });
    });

    it('should remove zero-width characters', () => {
      expect(validator.validateMessage('he\u200Bllo\uFEFF')).toEqual({ valid: true, value: 'hello' });
    });

    it('should reject messages that are empty after cleaning', () => {
      expect(validator.validateMessage('   ')).toEqual({ valid: false, error: 'Message cannot be empty' });
      expect(validator.validateMessage('\u200B')).toEqual({ valid: false, error: 'Message cannot be empty' });
    });

    it('should reject messages over the length limit', () => {
      expect(validator.validateMessage('x'.repeat(1000)).valid).toBe(true);
      expect(validator.validateMessage('x'.repeat(1001))).toEqual({
        valid: false,
        error: 'Message too long (max 1000 characters)',
      });
    });

    it('should measure message length in characters, not UTF-16 units', () => {
      const emoji = '\u{1F600}';
      expect(validator.validateMessage(emoji.repeat(1000))).toEqual({ valid: true, value: emoji.repeat(1000) });
      expect(validator.validateMessage(emoji.repeat(1001)).valid).toBe(false);
    });
  });
});
