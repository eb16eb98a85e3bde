/**
 * Offset-ordered lookup of hierarchy markers of one type.
 */

import type { HierarchyMarker, HierarchyType } from './types.js';

export class MarkerIndex {
  readonly type: HierarchyType;
  private readonly markers: HierarchyMarker[];

  constructor(type: HierarchyType, markers: Iterable<HierarchyMarker>) {
    this.type = type;
    this.markers = [...markers]
      .filter(marker => marker.type === type)
      .sort((a, b) => a.offset - b.offset);

    for (let i = 1; i < this.markers.length; i++) {
      if (this.markers[i].offset === this.markers[i - 1].offset) {
        throw new Error(`Duplicate ${type} marker at offset ${this.markers[i].offset}`);
      }
    }
  }

  get size(): number {
    return this.markers.length;
  }

  list(): readonly HierarchyMarker[] {
    return this.markers;
  }

  /**
   * Last marker whose offset is at or before `offset`, or null when the
   * offset precedes every marker.
   */
  nearestAtOrBefore(offset: number): HierarchyMarker | null {
    let lo = 0;
    let hi = this.markers.length - 1;
    let found: HierarchyMarker | null = null;

    while (lo <= hi) {
      const mid = (lo + hi) >>> 1;
      const marker = this.markers[mid];
      if (marker.offset <= offset) {
        found = marker;
        lo = mid + 1;
      } else {
        hi = mid - 1;
      }
    }

    return found;
  }
}
