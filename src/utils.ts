import stringWidth from "string-width";

const graphemes = new Intl.Segmenter(undefined, { granularity: "grapheme" });

// CJK-safe truncation: keep the leading characters that fit in N visual columns
export function sliceToWidth(str: string, maxWidth: number): { text: string; width: number } {
  if (maxWidth <= 0) return { text: "", width: 0 };
  const full = stringWidth(str);
  if (full <= maxWidth) return { text: str, width: full };
  let width = 0;
  let end = 0;
  // Whole graphemes only: ZWJ emoji and combining marks stay together
  for (const { segment } of graphemes.segment(str)) {
    const segmentWidth = stringWidth(segment);
    if (width + segmentWidth > maxWidth) break;
    width += segmentWidth;
    end += segment.length;
  }
  return { text: str.slice(0, end), width };
}

// CJK-safe padding: pad to N visual columns with spaces
export function padEndToWidth(str: string, targetWidth: number): string {
  const currentWidth = stringWidth(str);
  return currentWidth >= targetWidth
    ? str
    : str + " ".repeat(targetWidth - currentWidth);
}

// CJK-safe padStart: right-align to N visual columns
export function padStartToWidth(str: string, targetWidth: number): string {
  const currentWidth = stringWidth(str);
  return currentWidth >= targetWidth
    ? str
    : " ".repeat(targetWidth - currentWidth) + str;
}

// "#rrggbb" → [r, g, b]; anything unparsable maps to white
export function hexToRgb(hex: string): [number, number, number] {
  const m = /^#?([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i.exec(hex);
  if (!m) return [255, 255, 255];
  return [parseInt(m[1], 16), parseInt(m[2], 16), parseInt(m[3], 16)];
}
