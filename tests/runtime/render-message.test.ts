/**
 * Tests for the renderMessage template function.
 */

import { describe, expect, it } from 'vitest';
import { renderMessage } from '../../src/types.js';

describe('renderMessage', () => {
  describe('placeholder replacement', () => {
    it('replaces each placeholder with its context value', () => {
      expect(
        renderMessage('{operation} cannot be applied to {actual}', {
          operation: "'+'",
          actual: 'string',
        })
      ).toBe("'+' cannot be applied to string");
    });

    it('replaces repeated placeholders', () => {
      expect(renderMessage('{name} and {name}', { name: 'x' })).toBe('x and x');
    });
  });

  describe('missing values', () => {
    it('renders a missing value as blank', () => {
      expect(renderMessage('Hello {name}', {})).toBe('Hello ');
    });

    it('keeps the text around a missing value', () => {
      expect(renderMessage('{a}-{b}', { a: 'left' })).toBe('left-');
    });
  });

  describe('coercion', () => {
    it('converts numbers and booleans with String()', () => {
      expect(
        renderMessage('{operation} requires a single item, got {count}', {
          operation: 'first',
          count: 3,
        })
      ).toBe('first requires a single item, got 3');
      expect(renderMessage('{flag}', { flag: false })).toBe('false');
    });

    it('renders null as text', () => {
      expect(renderMessage('{value}', { value: null })).toBe('null');
    });
  });

  describe('malformed templates', () => {
    it('returns an unclosed template unchanged', () => {
      expect(renderMessage('Value {name', { name: 'x' })).toBe('Value {name');
    });

    it('leaves a stray closing brace', () => {
      expect(renderMessage('a } b', {})).toBe('a } b');
    });

    it('renders an empty template as blank', () => {
      expect(renderMessage('', { name: 'x' })).toBe('');
    });
  });
});
