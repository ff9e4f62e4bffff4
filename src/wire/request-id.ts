/**
 * Request ID generation.
 *
 * Each connection owns one generator: a seedable xorshift128+ stream whose
 * outputs are folded into the signed 32-bit range. Ids are correlation tokens
 * only, so collisions are possible and nothing here is cryptographic.
 */

import { randomBytes } from 'node:crypto'
import { InvalidArgumentError } from './errors.js'
import type { RequestID } from './types.js'

function splitmix64(seed: bigint): bigint {
  let s = BigInt.asUintN(64, seed + 0x9e3779b97f4a7c15n)
  s = BigInt.asUintN(64, (s ^ (s >> 30n)) * 0xbf58476d1ce4e5b9n)
  s = BigInt.asUintN(64, (s ^ (s >> 27n)) * 0x94d049bb133111ebn)
  return s ^ (s >> 31n)
}

/** 64 bits from the process entropy source */
export function entropySeed(): bigint {
  return randomBytes(8).readBigUInt64LE(0)
}

export class RequestIdGenerator {
  private state0: bigint
  private state1: bigint

  /**
   * @throws {InvalidArgumentError} if a number seed is not a finite integer
   */
  constructor(seed: bigint | number = entropySeed()) {
    if (typeof seed === 'number' && !Number.isInteger(seed)) {
      throw new InvalidArgumentError(`seed must be an integer, got ${seed}`)
    }
    const base = BigInt.asUintN(64, BigInt(seed))
    this.state0 = splitmix64(base)
    this.state1 = splitmix64(this.state0)
    // xorshift128+ must not start from an all-zero state
    if (this.state0 === 0n && this.state1 === 0n) {
      this.state1 = 1n
    }
  }

  private advance(): bigint {
    let s1 = this.state0
    const s0 = this.state1
    const result = BigInt.asUintN(64, s0 + s1)
    this.state0 = s0
    s1 = BigInt.asUintN(64, s1 ^ (s1 << 23n))
    this.state1 = s1 ^ s0 ^ (s1 >> 17n) ^ (s0 >> 26n)
    return result
  }

  /**
   * Next id, uniform over [-2^31, 2^31 - 1]. Uses the high half of the
   * 64-bit output, which has the better statistical quality.
   */
  next(): RequestID {
    return Number(BigInt.asIntN(32, this.advance() >> 32n))
  }
}
