import { randomInt } from 'crypto'
import { MAX_CORRELATION_ID } from '../protocol/codec'

/**
 * Sequential uint32 correlation ids starting from a random offset,
 * so a restarted client does not replay ids the server still remembers.
 */
export class CorrelationIds {
  private current: number

  constructor(start: number = randomInt(0, MAX_CORRELATION_ID + 1)) {
    if (!Number.isInteger(start) || start < 0 || start > MAX_CORRELATION_ID) {
      throw new RangeError(`Correlation id start out of range: ${start}`)
    }
    this.current = start
  }

  next(): number {
    const id = this.current
    this.current = id === MAX_CORRELATION_ID ? 0 : id + 1
    return id
  }
}
