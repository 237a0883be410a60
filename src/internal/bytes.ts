/**
 * Big-endian byte buffers for the rules serialization format.
 */

import { CorruptDataError } from '../errors'

export type ByteWriter = {
  writeByte(value: number): void
  writeInt(value: number): void
  writeLong(value: number): void
  toBytes(): Uint8Array
}

export type ByteReader = {
  readByte(): number
  readUnsignedByte(): number
  readInt(): number
  readLong(): number
  remaining(): number
}

export function createByteWriter(initialCapacity = 64): ByteWriter {
  let buffer = new Uint8Array(initialCapacity)
  let view = new DataView(buffer.buffer)
  let length = 0

  function ensure(extra: number): void {
    if (length + extra <= buffer.length) return
    const next = new Uint8Array(Math.max(buffer.length * 2, length + extra))
    next.set(buffer)
    buffer = next
    view = new DataView(buffer.buffer)
  }

  return {
    writeByte(value) {
      ensure(1)
      view.setUint8(length, value & 0xff)
      length += 1
    },
    writeInt(value) {
      ensure(4)
      view.setInt32(length, value)
      length += 4
    },
    writeLong(value) {
      ensure(8)
      view.setBigInt64(length, BigInt(value))
      length += 8
    },
    toBytes: () => buffer.slice(0, length),
  }
}

export function createByteReader(bytes: Uint8Array): ByteReader {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  let position = 0

  function take(size: number): number {
    if (position + size > bytes.byteLength) throw new CorruptDataError('Unexpected end of data')
    const at = position
    position += size
    return at
  }

  return {
    readByte: () => view.getInt8(take(1)),
    readUnsignedByte: () => view.getUint8(take(1)),
    readInt: () => view.getInt32(take(4)),
    readLong() {
      const value = view.getBigInt64(take(8))
      if (value > BigInt(Number.MAX_SAFE_INTEGER) || value < BigInt(Number.MIN_SAFE_INTEGER)) {
        throw new CorruptDataError(`Epoch second out of range: ${value}`)
      }
      return Number(value)
    },
    remaining: () => bytes.byteLength - position,
  }
}
