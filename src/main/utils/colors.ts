import { RgbColor } from '../../shared/models';

/**
 * Parses `#rrggbb`, `rrggbb` or `r,g,b` into an RGB triple.
 */
export function parseRgbColor(input: string): RgbColor {
  const text = input.trim();
  const hex = /^#?([0-9a-f]{6})$/i.exec(text);
  if (hex?.[1]) {
    const value = Number.parseInt(hex[1], 16);
    return [(value >> 16) & 0xff, (value >> 8) & 0xff, value & 0xff];
  }

  const parts = text.split(',').map((part) => part.trim());
  if (parts.length === 3 && parts.every((part) => /^\d{1,3}$/.test(part))) {
    const [red, green, blue] = parts.map((part) => Number.parseInt(part, 10));
    if (red !== undefined && green !== undefined && blue !== undefined && [red, green, blue].every((channel) => channel <= 255)) {
      return [red, green, blue];
    }
  }

  throw new Error(`Invalid colour "${input}". Use #rrggbb or r,g,b.`);
}

/**
 * Formats an RGB triple as lowercase `#rrggbb`.
 */
export function formatRgbColor(color: RgbColor): string {
  return `#${color.map((channel) => channel.toString(16).padStart(2, '0')).join('')}`;
}
