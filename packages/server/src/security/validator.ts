/**
 * Input validation for usernames and chat text.
 */

import { MESSAGE, USERNAME } from '../constants.js';

export type ValidationResult =
  | { valid: true; value: string }
  | { valid: false; error: string };

export interface ValidatorOptions {
  maxUsernameLength?: number;
  maxMessageLength?: number;
}

const CONTROL_CHARS_GLOBAL = new RegExp(USERNAME.CONTROL_CHARS.source, 'g');
const ZERO_WIDTH_CHARS = /[\u200B-\u200D\uFEFF]/g;

/** Length in Unicode code points, so astral characters count once */
function codePointLength(value: string): number {
  return [...value].length;
}

export class InputValidator {
  readonly maxUsernameLength: number;
  readonly maxMessageLength: number;

  constructor(options: ValidatorOptions = {}) {
    this.maxUsernameLength = options.maxUsernameLength ?? USERNAME.MAX_LENGTH;
    this.maxMessageLength = options.maxMessageLength ?? MESSAGE.MAX_MESSAGE_LENGTH;
  }

  /**
   * Validate a requested username. Surrounding whitespace is trimmed;
   * anything else that is not allowed rejects the name rather than
   * altering it. Over-long names are rejected, not truncated.
   */
  validateUsername(raw: string): ValidationResult {
    const name = raw.trim();

    if (name.length === 0) {
      return { valid: false, error: 'Username cannot be empty' };
    }
    if (codePointLength(name) > this.maxUsernameLength) {
      return { valid: false, error: `Username too long (max ${this.maxUsernameLength} characters)` };
    }
    if (USERNAME.CONTROL_CHARS.test(name)) {
      return { valid: false, error: 'Username contains control characters' };
    }
    if (USERNAME.FORBIDDEN_CHARS.test(name)) {
      return { valid: false, error: 'Username cannot contain | , ( or )' };
    }
    if (/\s/.test(name)) {
      return { valid: false, error: 'Username cannot contain spaces' };
    }
    const lowered = name.toLowerCase();
    if (USERNAME.RESERVED.some((reserved) => reserved === lowered)) {
      return { valid: false, error: `Username '${name}' is reserved` };
    }

    return { valid: true, value: name };
  }

  /**
   * Validate and normalise chat text: control and zero-width characters
   * are removed and runs of whitespace collapse to one space.
   */
  validateMessage(raw: string): ValidationResult {
    const text = raw
      .replace(CONTROL_CHARS_GLOBAL, ' ')
      .replace(ZERO_WIDTH_CHARS, '')
      .replace(/\s+/g, ' ')
      .trim();

    if (text.length === 0) {
      return { valid: false, error: 'Message cannot be empty' };
    }
    if (codePointLength(text) > this.maxMessageLength) {
      return { valid: false, error: `Message too long (max ${this.maxMessageLength} characters)` };
    }

    return { valid: true, value: text };
  }
}
