import { paletteColor, hexColor, intToRGB, contrastTextColor } from "./color-utils";

describe("paletteColor", () => {
  it("returns the indexed terminal color", () => {
    expect(paletteColor(0)).toBe(0x000000);
    expect(paletteColor(9)).toBe(0xff0000);
    expect(paletteColor(15)).toBe(0xffffff);
  });

  it("wraps indices outside the palette", () => {
    expect(paletteColor(16)).toBe(0x000000);
    expect(paletteColor(-1)).toBe(0xffffff);
  });
});

describe("hexColor", () => {
  it("formats a 0xRRGGBB number as a padded CSS color", () => {
    expect(hexColor(0xff0000)).toBe("#ff0000");
    expect(hexColor(0x0000ff)).toBe("#0000ff");
  });
});

describe("intToRGB", () => {
  it("splits a color into channels", () => {
    expect(intToRGB(0x123456)).toEqual([0x12, 0x34, 0x56]);
  });
});

describe("contrastTextColor", () => {
  it("picks black on light backgrounds and white on dark ones", () => {
    expect(contrastTextColor(0xffffff)).toBe(0x000000);
    expect(contrastTextColor(0xffff00)).toBe(0x000000);
    expect(contrastTextColor(0x000000)).toBe(0xffffff);
    expect(contrastTextColor(0x000080)).toBe(0xffffff);
  });
});
