import { describe, it, expect } from 'vitest';
import { runDemo } from './demo.js';
import { FIELD_LAWS } from './field.js';

describe('runDemo', () => {
  const lines: string[] = [];
  const summary = runDemo(m => lines.push(m));

  it('shows the arithmetic and the undefined inverse', () => {
    expect(summary.arithmetic).toEqual({
      'a + b': '4 + 1i',
      'a * b': '5 + 5i',
      'a⁻¹': '0.20 - 0.40i',
      '0⁻¹': 'DomainError',
    });
    expect(lines).toContain('a * b = 5 + 5i');
  });

  it('finds no counterexample to the field laws', () => {
    expect(summary.laws).toHaveLength(9);
    expect(summary.laws.filter(l => l.counterexample)).toEqual([]);
    expect(summary.nontrivial).toBe(true);
  });

  it('proves the laws and admits the open statements', () => {
    expect(summary.theorems.map(t => t.status)).toEqual([...FIELD_LAWS.map(() => 'proved'), 'proved', 'admitted', 'admitted']);
  });

  it('loses the quadrant once the angle leaves the principal range', () => {
    expect(summary.polar.map(p => p.holds)).toEqual([true, true, false, false]);
    expect(lines.filter(l => l.endsWith('<- quadrant lost'))).toHaveLength(2);
  });
});
