const EPOCH_MS = 1735689600000n; // 2025-01-01T00:00:00Z
const NODE_BITS = 10n;
const SEQUENCE_BITS = 12n;
const MAX_NODE = (1n << NODE_BITS) - 1n;
const SEQUENCE_MASK = (1n << SEQUENCE_BITS) - 1n;

export interface SnowflakeParts {
  timestamp: Date;
  nodeId: number;
  sequence: number;
}

/**
 * 64-bit ids rendered as decimal strings: 42 bits of milliseconds since
 * EPOCH_MS, 10 bits of node id, 12 bits of per-millisecond sequence.
 * Ids from one generator increase strictly.
 */
export class SnowflakeGenerator {
  private readonly node: bigint;
  private sequence = 0n;
  private lastMs = -1n;

  constructor(
    nodeId: number,
    private readonly clock: () => number = Date.now,
  ) {
    const node = BigInt(nodeId);
    if (node < 0n || node > MAX_NODE) {
      throw new Error(`nodeId must be between 0 and ${MAX_NODE}`);
    }
    this.node = node;
  }

  generate(): string {
    let ms = this.elapsed();

    if (ms < this.lastMs) {
      throw new Error(`Clock moved backwards by ${this.lastMs - ms}ms`);
    }

    if (ms === this.lastMs) {
      this.sequence = (this.sequence + 1n) & SEQUENCE_MASK;
      if (this.sequence === 0n) {
        // sequence exhausted for this millisecond
        while (ms <= this.lastMs) ms = this.elapsed();
      }
    } else {
      this.sequence = 0n;
    }

    this.lastMs = ms;
    return ((ms << (NODE_BITS + SEQUENCE_BITS)) | (this.node << SEQUENCE_BITS) | this.sequence).toString();
  }

  static parse(id: string): SnowflakeParts {
    const value = BigInt(id);
    return {
      timestamp: new Date(Number((value >> (NODE_BITS + SEQUENCE_BITS)) + EPOCH_MS)),
      nodeId: Number((value >> SEQUENCE_BITS) & MAX_NODE),
      sequence: Number(value & SEQUENCE_MASK),
    };
  }

  private elapsed(): bigint {
    return BigInt(this.clock()) - EPOCH_MS;
  }
}
