/**
 * Zone Rules Serialization
 *
 * A compact versioned binary encoding for zone rules and their parts. Every
 * stream starts with a version byte and a type byte.
 *
 * Offsets are one byte of 15-minute units, or the escape 127 followed by a
 * 32-bit second count. Epoch seconds that fall on a quarter hour between
 * 1825 and 2300 take three bytes; others take the escape 255 and a 64-bit
 * value. A transition rule packs into one 32-bit word, with trailing words
 * for any part that does not fit.
 */

import type {
  ZoneOffset, ZoneOffsetTransition, ZoneOffsetTransitionRule, ZoneRules, TimeDefinition,
} from './types'
import { CorruptDataError, DateTimeError, requireNonNull } from './errors'
import { floorDiv, floorMod } from './internal/math'
import { createByteReader, createByteWriter, type ByteReader, type ByteWriter } from './internal/bytes'
import { dayOfWeekOf } from './day-of-week'
import { offsetOfTotalSeconds } from './zone-offset'
import { timeOfSecondOfDay, timeToSecondOfDay } from './local-time'
import { transitionOfEpochSecond } from './zone-offset-transition'
import { transitionRuleOf } from './zone-offset-transition-rule'
import { fixedZoneRules, standardZoneRulesOfArrays } from './zone-rules'

const FORMAT_VERSION = 1

export const SerializedType = {
  STANDARD_RULES: 1,
  TRANSITION: 2,
  TRANSITION_RULE: 3,
  FIXED_RULES: 4,
} as const

const TIME_DEFINITIONS: readonly TimeDefinition[] = ['UTC', 'WALL', 'STANDARD']

const EPOCH_SEC_BASE = 4_575_744_000
const EPOCH_SEC_LIMIT = 10_413_792_000
const SECONDS_PER_DAY = 86_400

// ============================================================================
// Primitives
// ============================================================================

export function writeOffset(out: ByteWriter, offset: ZoneOffset): void {
  const secs = offset.totalSeconds
  const quarters = secs % 900 === 0 ? secs / 900 : 127
  out.writeByte(quarters)
  if (quarters === 127) out.writeInt(secs)
}

export function readOffset(input: ByteReader): ZoneOffset {
  const quarters = input.readByte()
  return offsetOfTotalSeconds(quarters === 127 ? input.readInt() : quarters * 900)
}

export function writeEpochSecond(out: ByteWriter, epochSecond: number): void {
  if (epochSecond >= -EPOCH_SEC_BASE && epochSecond < EPOCH_SEC_LIMIT && epochSecond % 900 === 0) {
    const store = (epochSecond + EPOCH_SEC_BASE) / 900
    out.writeByte((store >>> 16) & 255)
    out.writeByte((store >>> 8) & 255)
    out.writeByte(store & 255)
  } else {
    out.writeByte(255)
    out.writeLong(epochSecond)
  }
}

export function readEpochSecond(input: ByteReader): number {
  const hi = input.readUnsignedByte()
  if (hi === 255) return input.readLong()
  const mid = input.readUnsignedByte()
  const lo = input.readUnsignedByte()
  return ((hi << 16) + (mid << 8) + lo) * 900 - EPOCH_SEC_BASE
}

// ============================================================================
// Parts
// ============================================================================

function writeTransition(out: ByteWriter, transition: ZoneOffsetTransition): void {
  writeEpochSecond(out, transition.epochSecond)
  writeOffset(out, transition.offsetBefore)
  writeOffset(out, transition.offsetAfter)
}

function readTransition(input: ByteReader): ZoneOffsetTransition {
  const epochSecond = readEpochSecond(input)
  const before = readOffset(input)
  const after = readOffset(input)
  return transitionOfEpochSecond(epochSecond, before, after)
}

function smallDiff(diff: number): number {
  return diff === 0 || diff === 1800 || diff === 3600 ? diff / 1800 : 3
}

function writeTransitionRule(out: ByteWriter, rule: ZoneOffsetTransitionRule): void {
  const timeSecs = rule.timeEndOfDay ? SECONDS_PER_DAY : timeToSecondOfDay(rule.time)
  const stdOffset = rule.standardOffset.totalSeconds
  const beforeDiff = rule.offsetBefore.totalSeconds - stdOffset
  const afterDiff = rule.offsetAfter.totalSeconds - stdOffset
  const timeByte = timeSecs % 3600 === 0 ? (rule.timeEndOfDay ? 24 : rule.time.hour) : 31
  const stdOffsetByte = stdOffset % 900 === 0 ? stdOffset / 900 + 128 : 255
  const beforeByte = smallDiff(beforeDiff)
  const afterByte = smallDiff(afterDiff)
  const word =
    (rule.month << 28) |
    ((rule.dayOfMonthIndicator + 32) << 22) |
    ((rule.dayOfWeek ?? 0) << 19) |
    (timeByte << 14) |
    (TIME_DEFINITIONS.indexOf(rule.timeDefinition) << 12) |
    (stdOffsetByte << 4) |
    (beforeByte << 2) |
    afterByte
  out.writeInt(word)
  if (timeByte === 31) out.writeInt(timeSecs)
  if (stdOffsetByte === 255) out.writeInt(stdOffset)
  if (beforeByte === 3) out.writeInt(rule.offsetBefore.totalSeconds)
  if (afterByte === 3) out.writeInt(rule.offsetAfter.totalSeconds)
}

function readTransitionRule(input: ByteReader): ZoneOffsetTransitionRule {
  const data = input.readInt() >>> 0
  const month = data >>> 28
  const dom = ((data >>> 22) & 63) - 32
  const dowByte = (data >>> 19) & 7
  const timeByte = (data >>> 14) & 31
  const definition = TIME_DEFINITIONS[(data >>> 12) & 3]
  const stdByte = (data >>> 4) & 255
  const beforeByte = (data >>> 2) & 3
  const afterByte = data & 3
  if (definition === undefined) throw new CorruptDataError('Invalid time definition')
  const timeSecs = timeByte === 31 ? input.readInt() : timeByte * 3600
  const standardOffset = offsetOfTotalSeconds(stdByte === 255 ? input.readInt() : (stdByte - 128) * 900)
  const std = standardOffset.totalSeconds
  const offsetBefore = offsetOfTotalSeconds(beforeByte === 3 ? input.readInt() : std + beforeByte * 1800)
  const offsetAfter = offsetOfTotalSeconds(afterByte === 3 ? input.readInt() : std + afterByte * 1800)
  return transitionRuleOf({
    month,
    dayOfMonthIndicator: dom,
    dayOfWeek: dowByte === 0 ? null : dayOfWeekOf(dowByte),
    time: timeOfSecondOfDay(floorMod(timeSecs, SECONDS_PER_DAY)),
    timeEndOfDay: floorDiv(timeSecs, SECONDS_PER_DAY) === 1,
    timeDefinition: definition,
    standardOffset,
    offsetBefore,
    offsetAfter,
  })
}

function writeRules(out: ByteWriter, rules: ZoneRules): void {
  if (rules.type === 'fixed') {
    writeOffset(out, rules.offset)
    return
  }
  out.writeInt(rules.standardTransitions.length)
  for (const epochSecond of rules.standardTransitions) writeEpochSecond(out, epochSecond)
  for (const offset of rules.standardOffsets) writeOffset(out, offset)
  out.writeInt(rules.savingsInstantTransitions.length)
  for (const epochSecond of rules.savingsInstantTransitions) writeEpochSecond(out, epochSecond)
  for (const offset of rules.wallOffsets) writeOffset(out, offset)
  out.writeByte(rules.lastRules.length)
  for (const rule of rules.lastRules) writeTransitionRule(out, rule)
}

function readCount(input: ByteReader): number {
  const count = input.readInt()
  if (count < 0 || count > input.remaining()) throw new CorruptDataError(`Invalid element count: ${count}`)
  return count
}

function readStandardRules(input: ByteReader): ZoneRules {
  const standardTransitions = Array.from({ length: readCount(input) }, () => readEpochSecond(input))
  const standardOffsets = Array.from({ length: standardTransitions.length + 1 }, () => readOffset(input))
  const savingsTransitions = Array.from({ length: readCount(input) }, () => readEpochSecond(input))
  const wallOffsets = Array.from({ length: savingsTransitions.length + 1 }, () => readOffset(input))
  const lastRules = Array.from({ length: input.readUnsignedByte() }, () => readTransitionRule(input))
  return standardZoneRulesOfArrays(standardTransitions, standardOffsets, savingsTransitions, wallOffsets, lastRules)
}

// ============================================================================
// Streams
// ============================================================================

type Serializable = ZoneRules | ZoneOffsetTransition | ZoneOffsetTransitionRule

function encode(value: Serializable): Uint8Array {
  const out = createByteWriter()
  out.writeByte(FORMAT_VERSION)
  switch (value.kind) {
    case 'ZoneRules':
      out.writeByte(value.type === 'fixed' ? SerializedType.FIXED_RULES : SerializedType.STANDARD_RULES)
      writeRules(out, value)
      break
    case 'ZoneOffsetTransition':
      out.writeByte(SerializedType.TRANSITION)
      writeTransition(out, value)
      break
    case 'ZoneOffsetTransitionRule':
      out.writeByte(SerializedType.TRANSITION_RULE)
      writeTransitionRule(out, value)
      break
  }
  return out.toBytes()
}

/** Decodes any serialized value, checking the version and that no bytes are left over. */
export function decode(bytes: Uint8Array): Serializable {
  requireNonNull(bytes, 'bytes')
  const input = createByteReader(bytes)
  try {
    const version = input.readUnsignedByte()
    if (version !== FORMAT_VERSION) throw new CorruptDataError(`Unknown serialized version: ${version}`)
    const type = input.readUnsignedByte()
    let value: Serializable
    switch (type) {
      case SerializedType.STANDARD_RULES: value = readStandardRules(input); break
      case SerializedType.FIXED_RULES: value = fixedZoneRules(readOffset(input)); break
      case SerializedType.TRANSITION: value = readTransition(input); break
      case SerializedType.TRANSITION_RULE: value = readTransitionRule(input); break
      default: throw new CorruptDataError(`Unknown serialized type: ${type}`)
    }
    if (input.remaining() !== 0) throw new CorruptDataError('Unexpected trailing data')
    return value
  } catch (e) {
    if (e instanceof CorruptDataError || !(e instanceof DateTimeError)) throw e
    throw new CorruptDataError(`Invalid serialized data: ${e.message}`)
  }
}

export function encodeZoneRules(rules: ZoneRules): Uint8Array {
  return encode(requireNonNull(rules, 'rules'))
}

export function decodeZoneRules(bytes: Uint8Array): ZoneRules {
  const value = decode(bytes)
  if (value.kind !== 'ZoneRules') throw new CorruptDataError(`Expected zone rules but found ${value.kind}`)
  return value
}

export function encodeTransition(transition: ZoneOffsetTransition): Uint8Array {
  return encode(requireNonNull(transition, 'transition'))
}

export function decodeTransition(bytes: Uint8Array): ZoneOffsetTransition {
  const value = decode(bytes)
  if (value.kind !== 'ZoneOffsetTransition') throw new CorruptDataError(`Expected a transition but found ${value.kind}`)
  return value
}

export function encodeTransitionRule(rule: ZoneOffsetTransitionRule): Uint8Array {
  return encode(requireNonNull(rule, 'rule'))
}

export function decodeTransitionRule(bytes: Uint8Array): ZoneOffsetTransitionRule {
  const value = decode(bytes)
  if (value.kind !== 'ZoneOffsetTransitionRule') {
    throw new CorruptDataError(`Expected a transition rule but found ${value.kind}`)
  }
  return value
}

/** Encodes one offset on its own, without the stream header. */
export function encodeOffset(offset: ZoneOffset): Uint8Array {
  const out = createByteWriter(5)
  writeOffset(out, offset)
  return out.toBytes()
}

export function decodeOffset(bytes: Uint8Array): ZoneOffset {
  const input = createByteReader(bytes)
  const offset = readOffset(input)
  if (input.remaining() !== 0) throw new CorruptDataError('Unexpected trailing data')
  return offset
}

/** Encodes one epoch second on its own, without the stream header. */
export function encodeEpochSecond(epochSecond: number): Uint8Array {
  const out = createByteWriter(9)
  writeEpochSecond(out, epochSecond)
  return out.toBytes()
}

export function decodeEpochSecond(bytes: Uint8Array): number {
  const input = createByteReader(bytes)
  const epochSecond = readEpochSecond(input)
  if (input.remaining() !== 0) throw new CorruptDataError('Unexpected trailing data')
  return epochSecond
}
