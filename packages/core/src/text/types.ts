export interface Span {
  readonly start: number;
  readonly length: number;
}

/**
 * How a position follows an edit made exactly at it.
 * 'negative' stays in front of the inserted text, 'positive' moves past it.
 */
export type PointTrackingMode = 'positive' | 'negative';

/**
 * 'edge-exclusive' spans never grow from insertions at their edges,
 * 'edge-inclusive' spans absorb them.
 */
export type SpanTrackingMode = 'edge-exclusive' | 'edge-inclusive';

/** Whether a read-only region accepts insertions at its start and end. */
export type EdgeInsertionMode = 'allow' | 'deny';

export interface TextChange {
  readonly position: number;
  readonly oldText: string;
  readonly newText: string;
}

export function createSpan(start: number, length: number): Span {
  return { start, length };
}

export function spanFromBounds(start: number, end: number): Span {
  return { start, length: end - start };
}

export function spanEnd(span: Span): number {
  return span.start + span.length;
}

export function spansOverlap(a: Span, b: Span): boolean {
  return Math.max(a.start, b.start) < Math.min(spanEnd(a), spanEnd(b));
}

export function translatePosition(position: number, change: TextChange, mode: PointTrackingMode): number {
  const removed = change.oldText.length;
  const inserted = change.newText.length;

  if (position < change.position) return position;
  if (removed === 0 && position === change.position) {
    return mode === 'negative' ? position : position + inserted;
  }
  if (position >= change.position + removed) return position - removed + inserted;
  // Inside the removed text
  return mode === 'negative' ? change.position : change.position + inserted;
}

export function translateSpan(span: Span, change: TextChange, mode: SpanTrackingMode): Span {
  const startMode: PointTrackingMode = mode === 'edge-exclusive' ? 'positive' : 'negative';
  const endMode: PointTrackingMode = mode === 'edge-exclusive' ? 'negative' : 'positive';
  const start = translatePosition(span.start, change, startMode);
  const end = translatePosition(spanEnd(span), change, endMode);
  return spanFromBounds(start, Math.max(start, end));
}
