/**
 * Numeric helper tests
 */

import { describe, it, expect } from 'vitest';
import { roundHalfUp } from '../../../core/utils/numeric.js';

describe('roundHalfUp', () => {
  it('should round decimal ties up even when the binary value sits below the tie', () => {
    expect(roundHalfUp(1.005)).toBe(1.01);
    expect(roundHalfUp(2.675)).toBe(2.68);
    expect(roundHalfUp(12.345)).toBe(12.35);
  });

  it('should round non-ties to the nearest value', () => {
    expect(roundHalfUp(1.234)).toBe(1.23);
    expect(roundHalfUp(1.236)).toBe(1.24);
    expect(roundHalfUp(12308.4638)).toBe(12308.46);
  });

  it('should leave integers unchanged', () => {
    expect(roundHalfUp(0)).toBe(0);
    expect(roundHalfUp(42)).toBe(42);
  });

  it('should handle values printed in exponent notation', () => {
    expect(roundHalfUp(1e-7)).toBe(0);
  });

  it('should honour the decimals argument', () => {
    expect(roundHalfUp(1.0005, 3)).toBe(1.001);
    expect(roundHalfUp(2.5, 0)).toBe(3);
  });
});
