import type { ITextBuffer } from '../text/TextBuffer.js';
import { createSpan } from '../text/types.js';
import type { ReadOnlyRegionMode, RegionLockState } from './types.js';

export const UNLOCKED: RegionLockState = { mode: 'none' };

/**
 * Replaces the read-only regions described by `state` with the ones `mode`
 * needs, in one region edit against the buffer.
 *
 * - `begin-and-body`: a zero-length marker at 0 that denies insertion, and a
 *   body lock over everything written so far. Appending after the body stays
 *   possible because the body allows insertion at its edges.
 * - `all`: one region over the whole text denying insertion at both edges.
 * - `none`: nothing.
 *
 * An empty buffer gets no region, whatever the mode.
 */
export function setRegionLockMode(
  buffer: ITextBuffer,
  state: RegionLockState,
  mode: ReadOnlyRegionMode,
): RegionLockState {
  const length = buffer.currentSnapshot.length;

  return buffer.editReadOnlyRegions((edit) => {
    edit.clearReadOnlyRegion(state.begin);
    edit.clearReadOnlyRegion(state.body);

    if (length === 0) return { mode };

    if (mode === 'begin-and-body') {
      return {
        mode,
        begin: edit.createReadOnlyRegion(createSpan(0, 0), 'edge-exclusive', 'deny'),
        body: edit.createReadOnlyRegion(createSpan(0, length)),
      };
    }
    if (mode === 'all') {
      return {
        mode,
        body: edit.createReadOnlyRegion(createSpan(0, length), 'edge-exclusive', 'deny'),
      };
    }
    return { mode };
  });
}
