import { describe, expect, it } from 'vitest';
import { isMap, isSeq, stringify } from 'yaml';

import { sequenceItems } from '../../schema/type-compat';
import { isFlowStyle, markFlow } from '../flow-style';

describe('markFlow', () => {
  it('prints a marked list on one line', () => {
    const marked = markFlow([1, 2, 3]);

    expect(isSeq(marked)).toBe(true);
    expect(isFlowStyle(marked)).toBe(true);
    expect(stringify(marked)).toMatch(/^\[ ?1, 2, 3 ?\]\n$/);
  });

  it('leaves the elements readable as a sequence', () => {
    expect(sequenceItems(markFlow([1, 2, 3]))).toEqual([1, 2, 3]);
  });

  it('is idempotent', () => {
    const once = markFlow([[0, 0], [1, 2]]);
    const twice = markFlow(once);

    expect(stringify(twice)).toBe(stringify(once));
    expect(isFlowStyle(twice)).toBe(true);
  });

  it('marks mappings too', () => {
    const marked = markFlow({ x: 1, y: 2 });
    expect(isMap(marked)).toBe(true);
    expect(stringify(marked)).toMatch(/^\{ ?x: 1, y: 2 ?\}\n$/);
  });

  it('passes scalars through unchanged', () => {
    expect(markFlow('text')).toBe('text');
    expect(markFlow(7)).toBe(7);
    expect(markFlow(null)).toBe(null);
  });

  it('reports block containers as not flow', () => {
    expect(isFlowStyle([1, 2])).toBe(false);
    expect(isFlowStyle('x')).toBe(false);
  });
});
