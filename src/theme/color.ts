const HEX6 = /^#([0-9a-f]{6})$/i;
const HEX8 = /^#([0-9a-f]{6})[0-9a-f]{2}$/i;
const HEX3 = /^#([0-9a-f])([0-9a-f])([0-9a-f])$/i;
const HEX0X = /^0x([0-9a-f]{6})$/i;
const XRGB = /^rgb:([0-9a-f]{2})\/([0-9a-f]{2})\/([0-9a-f]{2})$/i;
const BARE = /^([0-9a-f]{6})$/i;

/**
 * Normalize the color literals terminal configs use to lowercase `#rrggbb`.
 * Returns null for anything else (named colors, rgba(), garbage).
 */
export function normalizeHex(raw: string | null | undefined, options: { allowBare?: boolean } = {}): string | null {
  if (!raw) return null;
  let s = raw.trim();
  if ((s.startsWith('"') && s.endsWith('"')) || (s.startsWith("'") && s.endsWith("'"))) {
    s = s.slice(1, -1).trim();
  }
  if (!s) return null;

  let m = HEX6.exec(s) ?? HEX8.exec(s) ?? HEX0X.exec(s);
  if (m) return `#${m[1].toLowerCase()}`;

  m = HEX3.exec(s);
  if (m) return `#${m[1]}${m[1]}${m[2]}${m[2]}${m[3]}${m[3]}`.toLowerCase();

  m = XRGB.exec(s);
  if (m) return `#${m[1]}${m[2]}${m[3]}`.toLowerCase();

  if (options.allowBare) {
    m = BARE.exec(s);
    if (m) return `#${m[1].toLowerCase()}`;
  }
  return null;
}

function toRgb(hex: string): [number, number, number] {
  const h = hex.replace(/^#/, "");
  const channel = (i: number) => Number.parseInt(h.slice(i, i + 2), 16);
  return [channel(0), channel(2), channel(4)];
}

function clamp(x: number): number {
  return Math.max(0, Math.min(255, x));
}

/** Linear blend of two `#rrggbb` colors; t=0 gives a, t=1 gives b. */
export function mixColor(a: string, b: string, t: number): string {
  const ca = toRgb(a);
  const cb = toRgb(b);
  return (
    "#" +
    ca
      .map((v, i) => clamp(Math.round(v * (1 - t) + cb[i] * t)))
      .map((v) => v.toString(16).padStart(2, "0"))
      .join("")
  );
}

export function isDark(hex: string): boolean {
  const [r, g, b] = toRgb(hex);
  return 0.299 * r + 0.587 * g + 0.114 * b < 128;
}
