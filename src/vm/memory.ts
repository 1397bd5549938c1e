/**
 * Linear memory.
 */

import { Trap, TrapKind } from "./errors.js";

/** Bytes per page. */
export const PAGE_SIZE = 65536;
/** Largest page count addressable with 32-bit offsets. */
export const MAX_PAGES = 65536;

/**
 * Little-endian, bounds-checked byte array that grows in whole pages.
 */
export class Memory {
  private buffer: ArrayBuffer;
  private view: DataView;
  private _bytes: Uint8Array;
  /** Maximum page count declared by the module. */
  readonly maximum: number;

  constructor(initial: number, maximum: number = MAX_PAGES) {
    this.maximum = Math.min(maximum, MAX_PAGES);
    this.buffer = new ArrayBuffer(initial * PAGE_SIZE);
    this.view = new DataView(this.buffer);
    this._bytes = new Uint8Array(this.buffer);
  }

  /** Current size in pages. */
  get pages(): number {
    return this.buffer.byteLength / PAGE_SIZE;
  }

  get byteLength(): number {
    return this.buffer.byteLength;
  }

  /** Live view of the contents; replaced on growth. */
  get bytes(): Uint8Array {
    return this._bytes;
  }

  /**
   * Grow by `delta` pages. Returns the previous size, or -1 when the result
   * would exceed the declared maximum.
   */
  grow(delta: number): number {
    const previous = this.pages;
    const next = previous + delta;
    if (delta < 0 || next > this.maximum) {
      return -1;
    }
    if (delta > 0) {
      const buffer = new ArrayBuffer(next * PAGE_SIZE);
      new Uint8Array(buffer).set(this._bytes);
      this.buffer = buffer;
      this.view = new DataView(buffer);
      this._bytes = new Uint8Array(buffer);
    }
    return previous;
  }

  /**
   * Effective address of an access, trapping when `width` bytes at it are
   * out of bounds. `address` is an i32 read as unsigned.
   */
  private at(address: number, offset: number, width: number): number {
    const ea = (address >>> 0) + offset;
    if (ea + width > this.buffer.byteLength) {
      throw new Trap(TrapKind.MemoryOutOfBounds, `out of bounds memory access at ${ea} (+${width})`);
    }
    return ea;
  }

  // =========================================================================
  // Loads
  // =========================================================================

  i32(address: number, offset = 0): number {
    return this.view.getInt32(this.at(address, offset, 4), true);
  }

  i64(address: number, offset = 0): bigint {
    return this.view.getBigInt64(this.at(address, offset, 8), true);
  }

  f32(address: number, offset = 0): number {
    return this.view.getFloat32(this.at(address, offset, 4), true);
  }

  f64(address: number, offset = 0): number {
    return this.view.getFloat64(this.at(address, offset, 8), true);
  }

  i8(address: number, offset = 0): number {
    return this.view.getInt8(this.at(address, offset, 1));
  }

  u8(address: number, offset = 0): number {
    return this.view.getUint8(this.at(address, offset, 1));
  }

  i16(address: number, offset = 0): number {
    return this.view.getInt16(this.at(address, offset, 2), true);
  }

  u16(address: number, offset = 0): number {
    return this.view.getUint16(this.at(address, offset, 2), true);
  }

  u32(address: number, offset = 0): number {
    return this.view.getUint32(this.at(address, offset, 4), true);
  }

  // =========================================================================
  // Stores
  // =========================================================================

  setI32(address: number, offset: number, value: number): void {
    this.view.setInt32(this.at(address, offset, 4), value, true);
  }

  setI64(address: number, offset: number, value: bigint): void {
    this.view.setBigInt64(this.at(address, offset, 8), value, true);
  }

  setF32(address: number, offset: number, value: number): void {
    this.view.setFloat32(this.at(address, offset, 4), value, true);
  }

  setF64(address: number, offset: number, value: number): void {
    this.view.setFloat64(this.at(address, offset, 8), value, true);
  }

  setI8(address: number, offset: number, value: number): void {
    this.view.setUint8(this.at(address, offset, 1), value & 0xff);
  }

  setI16(address: number, offset: number, value: number): void {
    this.view.setUint16(this.at(address, offset, 2), value & 0xffff, true);
  }

  // =========================================================================
  // Bulk access
  // =========================================================================

  /**
   * Copy `length` bytes out of memory.
   */
  read(address: number, length: number): Uint8Array {
    const start = this.at(address, 0, length);
    return this._bytes.slice(start, start + length);
  }

  write(address: number, bytes: Uint8Array): void {
    this._bytes.set(bytes, this.at(address, 0, bytes.length));
  }

  /**
   * Decode a UTF-8 string.
   */
  readString(address: number, length: number): string {
    return new TextDecoder().decode(this.read(address, length));
  }
}
