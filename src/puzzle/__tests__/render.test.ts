import { describe, it, expect } from 'vitest';
import { formatMove, formatPath, formatState } from '../render';
import { axisVector, describeFacing, facingDirection } from '../orientation';
import { applyTransition, toMove } from '../state';
import { getTransitionTable } from '../transitions';
import { edge, gear } from './helpers';

describe('render', () => {
  const table = getTransitionTable();
  const origin = gear(1, 'X', 0, 1);
  const rotate = edge(table, [1, 'X'], [1, 'Y']);
  const rotated = applyTransition(origin, rotate);
  const advance = edge(table, [1, 'Y'], [3, 'Y']);
  const advanced = applyTransition(rotated, advance);

  it('numbers moves from 1', () => {
    expect(formatMove(toMove(rotate, rotated), 0)).toBe('Step 1: Rotate');
    expect(formatMove(toMove(advance, advanced), 1)).toBe('Step 2: Move to side 3');
  });

  it('formats a whole path', () => {
    expect(formatPath([toMove(rotate, rotated), toMove(advance, advanced)])).toEqual([
      'Step 1: Rotate',
      'Step 2: Move to side 3'
    ]);
    expect(formatPath([])).toEqual([]);
  });

  it('describes a state with its polarity flag and facing', () => {
    expect(formatState('Origin', origin)).toBe('Origin : side 1 axis X tooth 0 polarity T (facing +X)');
    expect(formatState('Target', gear(6, 'X', 4, -1))).toBe(
      'Target : side 6 axis X tooth 4 polarity F (facing -X)'
    );
  });
});

describe('orientation', () => {
  it('returns unit axis vectors that callers may mutate', () => {
    const z = axisVector('Z');
    expect([z.x, z.y, z.z]).toEqual([0, 0, 1]);
    z.set(5, 5, 5);
    expect(axisVector('Z').z).toBe(1);
  });

  it('points along the axis for positive polarity', () => {
    const dir = facingDirection(gear(5, 'Y', 2, 1));
    expect(dir.y).toBe(1);
    expect(dir.lengthSq()).toBe(1);
  });

  it('points against the axis for negative polarity', () => {
    const dir = facingDirection(gear(3, 'Z', 0, -1));
    expect(dir.z).toBe(-1);
    expect(dir.lengthSq()).toBe(1);
    expect(describeFacing(gear(3, 'Z', 0, -1))).toBe('-Z');
    expect(describeFacing(gear(5, 'Y', 2, 1))).toBe('+Y');
  });
});
