import type { BoxAxisOrder, DetectedRecord, ImageSize, PixelBox } from './types.js';

export interface PixelBoxOptions {
  // Required: records carry no marker of which order the model used
  axisOrder: BoxAxisOrder;

  // Value the normalized coordinates are relative to (default 1000, must be > 0)
  scale?: number;
}

function readBox(record: DetectedRecord): [number, number, number, number] | undefined {
  const box = record.box ?? record['box_2d'];
  if (!Array.isArray(box) || box.length !== 4) return undefined;
  const [a, b, c, d] = box;
  if (
    typeof a !== 'number' ||
    typeof b !== 'number' ||
    typeof c !== 'number' ||
    typeof d !== 'number'
  ) {
    return undefined;
  }
  if (![a, b, c, d].every(Number.isFinite)) return undefined;
  return [a, b, c, d];
}

/**
 * Maps a record's normalized box onto an image of the given size.
 * Returns undefined when the box is missing, malformed or empty after scaling,
 * or when the scale is not a positive number.
 */
export function toPixelBox(
  record: DetectedRecord,
  size: ImageSize,
  options: PixelBoxOptions,
): PixelBox | undefined {
  const box = readBox(record);
  if (!box) return undefined;
  const scale = options.scale ?? 1000;
  if (!Number.isFinite(scale) || scale <= 0) return undefined;

  const [ny0, nx0, ny1, nx1] =
    options.axisOrder === 'yxyx' ? box : [box[1], box[0], box[3], box[2]];
  const px = (n: number, extent: number) => Math.trunc((n / scale) * extent);

  const pixel: PixelBox = {
    x0: px(nx0, size.width),
    y0: px(ny0, size.height),
    x1: px(nx1, size.width),
    y1: px(ny1, size.height),
  };
  if (pixel.x0 >= pixel.x1 || pixel.y0 >= pixel.y1) return undefined;
  return pixel;
}
