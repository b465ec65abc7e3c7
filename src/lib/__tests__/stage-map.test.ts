import { describe, it, expect } from 'vitest';
import { createStageMap, highestThreshold, markCrossings } from '../stage-map';

describe('stage map', () => {
  it('starts with every threshold unreached, sorted ascending', () => {
    const stages = createStageMap([500, 100, 300]);
    expect([...stages]).toEqual([
      [100, null],
      [300, null],
      [500, null],
    ]);
    expect(highestThreshold(stages)).toBe(500);
  });

  it('marks every threshold the total has passed', () => {
    const stages = markCrossings(createStageMap([100, 300, 500]), 320, '2025-03-01');
    expect(stages.get(100)).toBe('2025-03-01');
    expect(stages.get(300)).toBe('2025-03-01');
    expect(stages.get(500)).toBeNull();
  });

  it('counts reaching a threshold exactly as crossing it', () => {
    const stages = markCrossings(createStageMap([100]), 100, '2025-03-05');
    expect(stages.get(100)).toBe('2025-03-05');
  });

  it('never overwrites a date once set', () => {
    const first = markCrossings(createStageMap([100, 300]), 150, '2025-04-01');
    const second = markCrossings(first, 400, '2025-04-20');
    expect(second.get(100)).toBe('2025-04-01');
    expect(second.get(300)).toBe('2025-04-20');
  });

  it('returns a new map on change and leaves the old one alone', () => {
    const before = createStageMap([100]);
    const after = markCrossings(before, 120, '2025-06-01');
    expect(after).not.toBe(before);
    expect(before.get(100)).toBeNull();
  });

  it('returns the same map when nothing crosses', () => {
    const before = createStageMap([100]);
    expect(markCrossings(before, 50, '2025-06-01')).toBe(before);
  });
});
