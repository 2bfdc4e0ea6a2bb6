import { InvalidPolicyParamsError, NoChunksError } from "../../domain/errors.js";
import {
  AllocationEntry,
  AllocationPlan,
  Chunk,
  DIFFICULTIES,
  Difficulty,
  DifficultyCounts,
  ItemIdentity
} from "../../domain/models.js";

interface Share {
  chunkId: number;
  floor: number;
  // Fractional part of the share, kept as a numerator over the total weight so ties compare exactly.
  remainder: number;
}

/**
 * Distributes requested item counts across chunks in proportion to token weight
 * (largest-remainder method, ties to the lower chunk ordinal).
 */
export class Allocator {
  allocate(chunks: readonly Chunk[], requested: DifficultyCounts): AllocationPlan {
    for (const difficulty of DIFFICULTIES) {
      const count = requested[difficulty] ?? 0;
      if (!Number.isInteger(count) || count < 0) {
        throw new InvalidPolicyParamsError(
          `Requested ${difficulty} count must be a non-negative integer. Received: ${count}`
        );
      }
    }

    if (chunks.length === 0 && DIFFICULTIES.some((difficulty) => (requested[difficulty] ?? 0) > 0)) {
      throw new NoChunksError();
    }

    return {
      easy: this.allocateLevel(chunks, requested.easy ?? 0),
      medium: this.allocateLevel(chunks, requested.medium ?? 0),
      hard: this.allocateLevel(chunks, requested.hard ?? 0)
    };
  }

  private allocateLevel(chunks: readonly Chunk[], total: number): AllocationEntry[] {
    if (total === 0) {
      return [];
    }

    const totalWeight = chunks.reduce((sum, chunk) => sum + chunk.tokenWeight, 0);
    // Weightless chunk sets fall back to an even split.
    const weightOf = (chunk: Chunk): number => (totalWeight > 0 ? chunk.tokenWeight : 1);
    const denominator = totalWeight > 0 ? totalWeight : chunks.length;

    const shares: Share[] = chunks.map((chunk) => {
      const numerator = total * weightOf(chunk);
      return {
        chunkId: chunk.id,
        floor: Math.floor(numerator / denominator),
        remainder: numerator % denominator
      };
    });

    let leftover = total - shares.reduce((sum, share) => sum + share.floor, 0);
    const byRemainder = [...shares].sort(
      (left, right) => right.remainder - left.remainder || left.chunkId - right.chunkId
    );
    const counts = new Map(shares.map((share) => [share.chunkId, share.floor]));

    for (const share of byRemainder) {
      if (leftover === 0) {
        break;
      }
      counts.set(share.chunkId, (counts.get(share.chunkId) ?? 0) + 1);
      leftover -= 1;
    }

    return shares
      .map((share) => ({ chunkId: share.chunkId, itemCount: counts.get(share.chunkId) ?? 0 }))
      .filter((entry) => entry.itemCount > 0);
  }
}

export function allocatedTotal(plan: AllocationPlan, difficulty: Difficulty): number {
  return plan[difficulty].reduce((sum, entry) => sum + entry.itemCount, 0);
}

/**
 * One identity per allocated item, in plan order: difficulty, then chunk, then sequence.
 */
export function expandPlan(plan: AllocationPlan): ItemIdentity[] {
  return DIFFICULTIES.flatMap((difficulty) =>
    plan[difficulty].flatMap((entry) =>
      Array.from({ length: entry.itemCount }, (_, sequence) => ({
        chunkId: entry.chunkId,
        difficulty,
        sequence
      }))
    )
  );
}
