export interface NetworkConditions {
  packetLossRate: number // 0.0 to 1.0
  duplicateRate: number // 0.0 to 1.0, chance a delivered packet arrives twice
  minLatency: number // milliseconds
  maxLatency: number // milliseconds
  jitter: number // latency variation in milliseconds
}

export type PacketFate =
  | { kind: 'drop' }
  | { kind: 'deliver'; delays: number[] }

export const PERFECT_NETWORK: NetworkConditions = {
  packetLossRate: 0,
  duplicateRate: 0,
  minLatency: 0,
  maxLatency: 0,
  jitter: 0
}

function latency(conditions: NetworkConditions, random: () => number): number {
  const baseLatency = conditions.minLatency +
    random() * (conditions.maxLatency - conditions.minLatency)
  const jitter = (random() - 0.5) * 2 * conditions.jitter
  return Math.max(0, Math.round(baseLatency + jitter))
}

/**
 * Roll the dice for a single packet. Duplicates get their own latency, so
 * copies (and neighbouring packets) can arrive out of order.
 */
export function decideFate(conditions: NetworkConditions, random: () => number = Math.random): PacketFate {
  if (random() < conditions.packetLossRate) {
    return { kind: 'drop' }
  }

  const delays = [latency(conditions, random)]
  if (random() < conditions.duplicateRate) {
    delays.push(latency(conditions, random))
  }
  return { kind: 'deliver', delays }
}
