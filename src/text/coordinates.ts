/**
 * Coordinate translation between UTF-16 code units and UTF-8 bytes.
 *
 * Callers index strings by code unit; engines index subjects by byte.
 * A translator is built once per subject and answers both directions.
 */

const encoder = new TextEncoder();

function isHighSurrogate(unit: number): boolean {
  return unit >= 0xd800 && unit <= 0xdbff;
}

function isLowSurrogate(unit: number): boolean {
  return unit >= 0xdc00 && unit <= 0xdfff;
}

/** Whether units `index` and `index + 1` of `text` form one surrogate pair. */
export function isSurrogatePairAt(text: string, index: number): boolean {
  return (
    index + 1 < text.length &&
    isHighSurrogate(text.charCodeAt(index)) &&
    isLowSurrogate(text.charCodeAt(index + 1))
  );
}

export class CoordinateTranslator {
  readonly text: string;
  readonly bytes: Uint8Array;
  private readonly offsets: Int32Array;

  private constructor(text: string, bytes: Uint8Array, offsets: Int32Array) {
    this.text = text;
    this.bytes = bytes;
    this.offsets = offsets;
  }

  static of(text: string): CoordinateTranslator {
    const offsets = new Int32Array(text.length + 1);
    let byte = 0;
    let i = 0;

    while (i < text.length) {
      const unit = text.charCodeAt(i);
      offsets[i] = byte;

      if (unit < 0x80) {
        byte += 1;
        i++;
      } else if (unit < 0x800) {
        byte += 2;
        i++;
      } else if (
        isHighSurrogate(unit) &&
        i + 1 < text.length &&
        isLowSurrogate(text.charCodeAt(i + 1))
      ) {
        // Both halves of the pair start at the same byte
        offsets[i + 1] = byte;
        byte += 4;
        i += 2;
      } else {
        // BMP character, or a lone surrogate that encodes as U+FFFD
        byte += 3;
        i++;
      }
    }
    offsets[text.length] = byte;

    const bytes = encoder.encode(text);
    if (bytes.length !== byte) {
      throw new RangeError(
        `UTF-8 length mismatch: expected ${byte} bytes, encoder produced ${bytes.length}`,
      );
    }
    return new CoordinateTranslator(text, bytes, offsets);
  }

  /** Number of code units in the subject. */
  get length(): number {
    return this.text.length;
  }

  unitToByte(index: number): number {
    if (!Number.isInteger(index) || index < 0 || index > this.text.length) {
      throw new RangeError(
        `Code unit offset ${index} out of range [0, ${this.text.length}]`,
      );
    }
    return this.offsets[index];
  }

  /**
   * Byte offset of the first code point starting at or after `index`.
   * Differs from unitToByte only on the low half of a surrogate pair.
   */
  ceilByte(index: number): number {
    const byte = this.unitToByte(index);
    return index > 0 && this.isPairStart(index - 1)
      ? this.offsets[index + 1]
      : byte;
  }

  /**
   * Map a byte offset reported by an engine back to a code unit index.
   * Offsets must sit on a code point boundary.
   */
  byteToUnit(byteOffset: number): number {
    const index = this.lowerBound(byteOffset);
    if (index > this.text.length || this.offsets[index] !== byteOffset) {
      throw new RangeError(
        `Byte offset ${byteOffset} is not on a code point boundary`,
      );
    }
    return index;
  }

  /**
   * Like byteToUnit, but rounds an unaligned offset down to the start of
   * the enclosing code point. Used for diagnostics only.
   */
  floorUnit(byteOffset: number): number {
    if (byteOffset <= 0) return 0;
    if (byteOffset >= this.bytes.length) return this.text.length;
    const index = this.lowerBound(byteOffset);
    if (this.offsets[index] === byteOffset) return index;
    let floor = index - 1;
    // Step back to the high half if we landed on the second unit of a pair
    while (floor > 0 && this.offsets[floor - 1] === this.offsets[floor]) {
      floor--;
    }
    return floor;
  }

  /** Whether units `index` and `index + 1` form one surrogate pair. */
  isPairStart(index: number): boolean {
    return isSurrogatePairAt(this.text, index);
  }

  /** Lowest index whose recorded byte offset is >= byteOffset. */
  private lowerBound(byteOffset: number): number {
    let lo = 0;
    let hi = this.text.length + 1;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.offsets[mid] < byteOffset) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    return lo;
  }
}
