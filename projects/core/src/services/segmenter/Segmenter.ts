/**
 * How a segment ended.
 * - "space": cut at a space; the space separates this segment from the next
 * - "forced": cut inside a token longer than the window
 * - "end": last segment of the input
 */
export type SegmentCut = "space" | "forced" | "end";

export interface Segment {
  readonly text: string;
  readonly cut: SegmentCut;
}

const SPACE = " ";

/**
 * Splits text into segments shorter than `maxLength` code points, cutting at
 * the latest space in the window so words stay whole. A window without any
 * space is cut exactly at `maxLength - 1`.
 *
 * `maxLength <= 1` disables splitting.
 */
export function splitByLength(text: string, maxLength: number): readonly Segment[] {
  if (maxLength <= 1) {
    return [{ text, cut: "end" }];
  }

  const limit = maxLength - 1;
  const segments: Segment[] = [];
  let current: string[] = [];
  let lastSpace = -1;

  for (const ch of text) {
    if (ch === SPACE) {
      lastSpace = current.length;
    }
    current.push(ch);

    if (current.length === limit) {
      if (lastSpace >= 0) {
        segments.push({ text: current.slice(0, lastSpace).join(""), cut: "space" });
        // Nothing after the latest space can be another space.
        current = current.slice(lastSpace + 1);
      } else {
        segments.push({ text: current.join(""), cut: "forced" });
        current = [];
      }
      lastSpace = -1;
    }
  }

  if (current.length > 0) {
    segments.push({ text: current.join(""), cut: "end" });
  }

  return segments;
}

/**
 * Rebuilds text from per-segment outputs. Segments cut at a space get that
 * space back; forced cuts are rejoined without a separator.
 */
export function joinSegments(
  parts: readonly { readonly text: string; readonly cut: SegmentCut }[]
): string {
  let result = "";
  for (const part of parts) {
    result += part.text;
    if (part.cut === "space") {
      result += SPACE;
    }
  }
  return result;
}
