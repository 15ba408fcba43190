/**
 * Colour assignment for renderers. The palette is passed in so callers own
 * their colour scheme.
 */

export const DEFAULT_PALETTE: readonly string[] = [
  '#FF6B6B', '#4ECDC4', '#45B7D1', '#96CEB4', '#FECA57', '#DDA0DD',
  '#FF9FF3', '#54A0FF', '#5F27CD', '#00D2D3', '#FF9F43', '#10AC84',
  '#EE5A24', '#A55EEA', '#26DE81', '#778CA3', '#F8B500', '#FC427B'
];

/** Maps each distinct name to a colour in first-seen order, cycling the palette. */
export function assignItemColors(
  names: Iterable<string>,
  palette: readonly string[] = DEFAULT_PALETTE
): Record<string, string> {
  if (palette.length === 0) {
    throw new Error('Colour palette must not be empty');
  }

  const colors = new Map<string, string>();
  for (const name of names) {
    if (colors.has(name)) continue;
    colors.set(name, palette[colors.size % palette.length]);
  }
  return Object.fromEntries(colors);
}
