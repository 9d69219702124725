/**
 * Canonical decomposition (NFD) with an offset map back to the source text.
 *
 * Canonical equivalence is approximated by matching decomposed pattern
 * text against decomposed subjects. Match offsets are found in the NFD
 * text and have to be reported against the caller's original string.
 */

const CLUSTER = /\P{M}\p{M}*|\p{M}+/gu;

export class CanonicalText {
  readonly original: string;
  readonly normalized: string;
  /** original unit index -> normalized unit index */
  private readonly forward: Int32Array;
  /** normalized unit index -> original start of the enclosing segment */
  private readonly backStart: Int32Array;
  /** normalized unit index -> original end of the enclosing segment */
  private readonly backEnd: Int32Array;

  private constructor(
    original: string,
    normalized: string,
    forward: Int32Array,
    backStart: Int32Array,
    backEnd: Int32Array,
  ) {
    this.original = original;
    this.normalized = normalized;
    this.forward = forward;
    this.backStart = backStart;
    this.backEnd = backEnd;
  }

  static of(text: string): CanonicalText {
    const segments: Array<[origStart: number, origEnd: number, nfd: string]> =
      [];

    for (const match of text.matchAll(CLUSTER)) {
      const cluster = match[0];
      const clusterStart = match.index ?? 0;
      const nfd = cluster.normalize("NFD");
      const points = Array.from(cluster);
      const perPoint = points.map((point) => point.normalize("NFD"));

      if (perPoint.join("") === nfd) {
        let offset = clusterStart;
        for (let i = 0; i < points.length; i++) {
          segments.push([offset, offset + points[i].length, perPoint[i]]);
          offset += points[i].length;
        }
      } else {
        // Marks were reordered: the cluster maps as one unit
        segments.push([clusterStart, clusterStart + cluster.length, nfd]);
      }
    }

    const normalized = segments.map((segment) => segment[2]).join("");
    const forward = new Int32Array(text.length + 1);
    const backStart = new Int32Array(normalized.length + 1);
    const backEnd = new Int32Array(normalized.length + 1);

    let nfdOffset = 0;
    for (const [origStart, origEnd, nfd] of segments) {
      for (let i = origStart; i < origEnd; i++) {
        forward[i] = nfdOffset;
      }
      backStart[nfdOffset] = origStart;
      backEnd[nfdOffset] = origStart;
      for (let j = 1; j < nfd.length; j++) {
        backStart[nfdOffset + j] = origStart;
        backEnd[nfdOffset + j] = origEnd;
      }
      nfdOffset += nfd.length;
    }
    forward[text.length] = normalized.length;
    backStart[normalized.length] = text.length;
    backEnd[normalized.length] = text.length;

    return new CanonicalText(text, normalized, forward, backStart, backEnd);
  }

  /** Map an original offset into the normalized text. */
  toNormalized(index: number): number {
    return this.forward[index];
  }

  /** Map a normalized match start back, rounding down to a segment start. */
  toOriginalStart(index: number): number {
    return this.backStart[index];
  }

  /** Map a normalized match end back, rounding up to a segment end. */
  toOriginalEnd(index: number): number {
    return this.backEnd[index];
  }
}
