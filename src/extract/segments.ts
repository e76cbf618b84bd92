/**
 * Result segments: the ordered text/image units of a shindan result.
 * Discriminated union preserving document order.
 */

export type Segment = { type: 'text'; value: string } | { type: 'image'; url: string };

export type SegmentType = Segment['type'];

export type SegmentOf<T extends SegmentType> = Extract<Segment, { type: T }>;

export function textSegment(value: string): Segment {
  return { type: 'text', value };
}

export function imageSegment(url: string): Segment {
  return { type: 'image', url };
}

/** The string a segment contributes to the reading order: its text, or its image URL. */
export function segmentText(segment: Segment): string {
  return segment.type === 'text' ? segment.value : segment.url;
}

/**
 * Linearize a sequence back to reading order. Both parsing strategies yield
 * the same string for the same result.
 */
export function segmentsToText(segments: readonly Segment[]): string {
  return segments.map(segmentText).join('');
}

export function filterSegmentsByType<T extends SegmentType>(
  segments: readonly Segment[],
  type: T
): SegmentOf<T>[] {
  return segments.filter((segment): segment is SegmentOf<T> => segment.type === type);
}

export function segmentEquals(a: Segment, b: Segment): boolean {
  if (a.type === 'text') return b.type === 'text' && a.value === b.value;
  return b.type === 'image' && a.url === b.url;
}

export function segmentsEqual(a: readonly Segment[], b: readonly Segment[]): boolean {
  return a.length === b.length && a.every((segment, i) => segmentEquals(segment, b[i]));
}
