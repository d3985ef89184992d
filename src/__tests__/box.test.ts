import { describe, it, expect } from 'vitest';
import { toPixelBox } from '../box.js';

const size = { width: 640, height: 480 };

describe('toPixelBox', () => {
  it('reads [y0, x0, y1, x1] boxes', () => {
    expect(toPixelBox({ box: [100, 200, 500, 800] }, size, { axisOrder: 'yxyx' })).toEqual({
      x0: 128,
      y0: 48,
      x1: 512,
      y1: 240,
    });
  });

  it('reads [x0, y0, x1, y1] boxes', () => {
    expect(toPixelBox({ box: [200, 100, 800, 500] }, size, { axisOrder: 'xyxy' })).toEqual({
      x0: 128,
      y0: 48,
      x1: 512,
      y1: 240,
    });
  });

  it('falls back to box_2d', () => {
    expect(toPixelBox({ box_2d: [100, 200, 500, 800] }, size, { axisOrder: 'yxyx' })).toEqual({
      x0: 128,
      y0: 48,
      x1: 512,
      y1: 240,
    });
  });

  it('honours a custom scale', () => {
    const box = toPixelBox({ box: [0.25, 0.5, 0.75, 1] }, { width: 100, height: 100 }, {
      axisOrder: 'xyxy',
      scale: 1,
    });
    expect(box).toEqual({ x0: 25, y0: 50, x1: 75, y1: 100 });
  });

  it('skips inverted boxes', () => {
    expect(toPixelBox({ box: [500, 200, 100, 800] }, size, { axisOrder: 'yxyx' })).toBeUndefined();
  });

  it('skips malformed boxes', () => {
    expect(toPixelBox({ box: ['a', 1, 2, 3] }, size, { axisOrder: 'yxyx' })).toBeUndefined();
    expect(toPixelBox({ box: [1, 2, 3] }, size, { axisOrder: 'yxyx' })).toBeUndefined();
    expect(toPixelBox({ label: 'no box' }, size, { axisOrder: 'yxyx' })).toBeUndefined();
  });

  it('rejects a scale that is not a positive number', () => {
    const record = { box: [0, 0, 5, 5] };
    expect(toPixelBox(record, size, { axisOrder: 'yxyx', scale: 0 })).toBeUndefined();
    expect(toPixelBox(record, size, { axisOrder: 'yxyx', scale: -10 })).toBeUndefined();
    expect(toPixelBox(record, size, { axisOrder: 'yxyx', scale: Number.NaN })).toBeUndefined();
  });
});
