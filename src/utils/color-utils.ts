import { PALETTE_SIZE } from "../constants";

/** The 16 standard terminal colors, as 0xRRGGBB. */
const PALETTE: readonly number[] = [
  0x000000, 0x800000, 0x008000, 0x808000, 0x000080, 0x800080, 0x008080, 0xc0c0c0,
  0x808080, 0xff0000, 0x00ff00, 0xffff00, 0x0000ff, 0xff00ff, 0x00ffff, 0xffffff,
];

/** Returns the palette color for an index, wrapping out-of-range indices. */
export function paletteColor(index: number): number {
  return PALETTE[((Math.trunc(index) % PALETTE_SIZE) + PALETTE_SIZE) % PALETTE_SIZE];
}

/** Convert a 0xRRGGBB number to a CSS hex color string. */
export function hexColor(c: number): string {
  return `#${c.toString(16).padStart(6, "0")}`;
}

/** Convert a 0xRRGGBB integer to [r, g, b] in 0..255. */
export function intToRGB(c: number): [number, number, number] {
  // eslint-disable-next-line no-bitwise
  return [(c >> 16) & 0xff, (c >> 8) & 0xff, c & 0xff];
}

/** Black or white, whichever reads better on the given background. */
export function contrastTextColor(background: number): number {
  const [r, g, b] = intToRGB(background);
  const luminance = 0.299 * r + 0.587 * g + 0.114 * b;
  return luminance > 140 ? 0x000000 : 0xffffff;
}
