import { describe, it, expect } from 'vitest';
import { formatDuration } from '../format.js';

describe('formatDuration', () => {
  it.each([
    [0, '0s'],
    [0.5, '0s'],
    [-30, '0s'],
    [59, '59s'],
    [60, '1m'],
    [3_600, '1h'],
    [86_401, '1d 1s'],
    [93_784, '1d 2h 3m 4s'],
    [93_784.9, '1d 2h 3m 4s'],
  ])('renders %d seconds as %s', (seconds, expected) => {
    expect(formatDuration(seconds)).toBe(expected);
  });
});
