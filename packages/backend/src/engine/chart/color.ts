import type { RandomSource, ResourceStyles } from './types.js';

export const GOLDEN_RATIO_CONJUGATE = 0.618033988749895;

const SATURATION = 0.5;
const VALUE = 0.5;

function channel(x: number): number {
  return Math.min(255, Math.floor(x * 256));
}

/**
 * HSV to packed 0xRRGGBB. All inputs in [0, 1).
 */
export function hsvToRgb(h: number, s: number, v: number): number {
  const sector = Math.floor(h * 6);
  const f = h * 6 - sector;
  const p = v * (1 - s);
  const q = v * (1 - f * s);
  const t = v * (1 - (1 - f) * s);

  const rgb = (r: number, g: number, b: number): number =>
    (channel(r) << 16) | (channel(g) << 8) | channel(b);

  switch (sector) {
    case 0:
      return rgb(v, t, p);
    case 1:
      return rgb(q, v, p);
    case 2:
      return rgb(p, v, t);
    case 3:
      return rgb(p, q, v);
    case 4:
      return rgb(t, p, v);
    default:
      return rgb(v, p, q);
  }
}

export function toHex(rgb: number): string {
  return `#${rgb.toString(16).padStart(6, '0')}`;
}

/**
 * Hues for `count` resources, stepping by the golden ratio conjugate from a
 * random start so that neighbouring resources land far apart on the wheel.
 * See https://martin.ankerl.com/2009/12/09/how-to-create-random-colors-programmatically/
 */
export function resourceHues(count: number, random: RandomSource): number[] {
  const hues: number[] = [];
  let h = random();

  for (let i = 0; i < count; i++) {
    hues.push(h);
    h = (h + GOLDEN_RATIO_CONJUGATE) % 1;
  }

  return hues;
}

export function assignResourceStyles(count: number, random: RandomSource): ResourceStyles[] {
  return resourceHues(count, random).map((hue, resourceIndex) => {
    const color = toHex(hsvToRgb(hue, SATURATION, VALUE));

    return Object.freeze({
      resourceIndex,
      color,
      closed: Object.freeze({
        className: `resource-${resourceIndex}-closed`,
        variant: 'closed' as const,
        fill: color,
        stroke: color,
        strokeWidth: 1,
      }),
      open: Object.freeze({
        className: `resource-${resourceIndex}-open`,
        variant: 'open' as const,
        fill: 'none',
        stroke: color,
        strokeWidth: 2,
      }),
    });
  });
}
