/**
 * Opcode and flag encoding.
 *
 * Flag sets map through the explicit name → bit tables in ./types.js, so the
 * order callers list flags in never changes the encoded value.
 */

import { UnrecognizedOpcodeError } from './errors.js'
import {
  OpCode,
  QueryOption,
  ReplyFlag,
  UpdateFlag,
  type OpCodeValue,
  type QueryOptionName,
  type UpdateFlagName,
} from './types.js'

const OPCODE_BY_VALUE = new Map<number, OpCodeValue>(
  Object.values(OpCode).map((value) => [value, value])
)

const OPCODE_NAME_BY_VALUE = new Map<number, string>(
  Object.entries(OpCode).map(([name, value]) => [value, name])
)

export function opcodeToWire(opcode: OpCodeValue): number {
  return opcode
}

/**
 * Map an int32 read off the wire back to an opcode.
 *
 * @throws UnrecognizedOpcodeError for anything outside the nine defined values
 */
export function wireToOpcode(value: number): OpCodeValue {
  const opcode = OPCODE_BY_VALUE.get(value)
  if (opcode === undefined) {
    throw new UnrecognizedOpcodeError(value)
  }
  return opcode
}

/**
 * Symbolic name for logging, e.g. `OP_QUERY`.
 */
export function opcodeName(opcode: OpCodeValue): string {
  const name = OPCODE_NAME_BY_VALUE.get(opcode)
  if (name === undefined) {
    throw new UnrecognizedOpcodeError(opcode)
  }
  return name
}

export function encodeQueryOptions(options: Iterable<QueryOptionName>): number {
  let bits = 0
  for (const option of options) {
    bits |= QueryOption[option]
  }
  return bits
}

export function encodeUpdateFlags(flags: Iterable<UpdateFlagName>): number {
  let bits = 0
  for (const flag of flags) {
    bits |= UpdateFlag[flag]
  }
  return bits
}

/**
 * Names of the known reply flags set in `bits`, plus the raw value of any
 * unknown high bits. Only used to make error messages readable.
 */
export function describeReplyFlags(bits: number): string[] {
  const names: string[] = []
  let known = 0
  for (const [name, bit] of Object.entries(ReplyFlag)) {
    known |= bit
    if ((bits & bit) !== 0) {
      names.push(name)
    }
  }
  const unknown = bits & ~known
  if (unknown !== 0) {
    names.push(`0x${(unknown >>> 0).toString(16)}`)
  }
  return names
}
