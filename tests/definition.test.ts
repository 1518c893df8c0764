/**
 * Definition Locator Tests
 */

import { describe, it, expect } from 'vitest';
import { locateDefinition } from '../src/definition.js';
import { SpanCandidate } from '../src/span.js';

describe('locateDefinition', () => {
  it('takes the words spelling out the abbreviation', () => {
    const result = locateDefinition(new SpanCandidate(27, 30, 'WHO'), 'World Health Organization (WHO)');
    expect(result).toEqual({ success: true, value: new SpanCandidate(0, 25, 'World Health Organization') });
  });

  it('starts at the last key-initial token', () => {
    const line = 'Data from the World Health Organization (WHO)';
    const result = locateDefinition(new SpanCandidate(41, 44, 'WHO'), line);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.value).toBe('World Health Organization');
      expect(result.value.start).toBe(14);
      expect(result.value.stop).toBe(39);
    }
  });

  it('walks back over as many key tokens as the abbreviation holds', () => {
    const line = 'a proposed Public Private Partnership (PPP)';
    const result = locateDefinition(new SpanCandidate(39, 42, 'PPP'), line);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.value).toBe('Public Private Partnership');
      expect(result.value.start).toBe(11);
    }
  });

  it('keeps true offsets across runs of whitespace', () => {
    const line = 'the   World  Health Organization (WHO)';
    const result = locateDefinition(new SpanCandidate(34, 37, 'WHO'), line);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.value.value).toBe('World  Health Organization');
      expect(result.value.start).toBe(6);
      expect(result.value.stop).toBe(32);
      expect(line.slice(result.value.start, result.value.stop)).toBe(result.value.value);
    }
  });

  it('fails when too few tokens start with the key', () => {
    const result = locateDefinition(new SpanCandidate(18, 21, 'WHO'), 'the Organization (WHO)');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.reason).toBe('insufficient-key-tokens');
    }
  });

  it('fails when nothing precedes the candidate', () => {
    const result = locateDefinition(new SpanCandidate(1, 4, 'WHO'), '(WHO)');
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.reason).toBe('insufficient-key-tokens');
    }
  });
});
