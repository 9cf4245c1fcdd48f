import type {
  Disposition,
  EmbeddingVector,
  FragmentLocation,
  PatternTag,
  SimilarityMatch
} from "../types.js";
import { VectorDimensionMismatchError } from "../errors/similarity.errors.js";
import { dotProduct, normalizeVector } from "./vectorMath.js";

export type IndexEntryInput = {
  fragmentId: string;
  vector: ArrayLike<number>;
  disposition?: Disposition;
  location?: FragmentLocation | null;
  patterns?: readonly PatternTag[];
};

export type IndexMutation =
  | { kind: "insert"; entry: IndexEntryInput }
  | { kind: "remove"; fragmentId: string };

export type SimilarityIndexOptions = {
  dimensions: number;
  // Dead share of the arena above which apply() compacts.
  compactionThreshold?: number;
  minCompactionSlots?: number;
};

/**
 * An immutable view of the index. Arena slots are never rewritten, only
 * appended, so a snapshot keeps answering from the same entries while writers
 * publish newer versions.
 */
export class IndexSnapshot {
  constructor(
    readonly version: number,
    readonly dimensions: number,
    private readonly arena: readonly EmbeddingVector[],
    private readonly live: readonly number[],
    private readonly byFragment: ReadonlyMap<string, number>
  ) {}

  get size(): number {
    return this.live.length;
  }

  get(fragmentId: string): EmbeddingVector | null {
    const handle = this.byFragment.get(fragmentId);
    return handle === undefined ? null : this.arena[handle] ?? null;
  }

  has(fragmentId: string): boolean {
    return this.byFragment.has(fragmentId);
  }

  // Live entries in insertion order.
  entries(): EmbeddingVector[] {
    return this.live.map((handle) => this.arena[handle]);
  }

  query(vector: ArrayLike<number>, k: number): SimilarityMatch[] {
    const limit = Math.floor(k);
    if (!(limit > 0) || this.live.length === 0) return [];
    if (vector.length !== this.dimensions) {
      throw new VectorDimensionMismatchError(this.dimensions, vector.length);
    }
    const target = normalizeVector(vector);
    const scored: SimilarityMatch[] = this.live.map((handle) => {
      const entry = this.arena[handle];
      // Opposing vectors score 0; float32 storage can push a match past 1.
      return { vector: entry, similarity: Math.min(1, Math.max(0, dotProduct(target, entry.vector))) };
    });
    scored.sort((a, b) => b.similarity - a.similarity || a.vector.seq - b.vector.seq);
    return scored.slice(0, limit);
  }
}

/**
 * Flat cosine index over an append-only arena of immutable entries. Writers
 * publish a new snapshot per insert/remove/apply; readers bind to whichever
 * snapshot was current when they started.
 */
export class SimilarityIndex {
  readonly dimensions: number;
  private readonly compactionThreshold: number;
  private readonly minCompactionSlots: number;
  private arena: EmbeddingVector[] = [];
  private nextSeq = 0;
  private current: IndexSnapshot;

  constructor(options: SimilarityIndexOptions) {
    if (!Number.isInteger(options.dimensions) || options.dimensions <= 0) {
      throw new RangeError(`Index dimensions must be a positive integer, got ${options.dimensions}.`);
    }
    this.dimensions = options.dimensions;
    this.compactionThreshold = options.compactionThreshold ?? 0.25;
    this.minCompactionSlots = options.minCompactionSlots ?? 64;
    this.current = new IndexSnapshot(0, this.dimensions, this.arena, [], new Map());
  }

  snapshot(): IndexSnapshot {
    return this.current;
  }

  get version(): number {
    return this.current.version;
  }

  get size(): number {
    return this.current.size;
  }

  get deadSlots(): number {
    return this.arena.length - this.current.size;
  }

  insert(
    fragmentId: string,
    vector: ArrayLike<number>,
    disposition?: Disposition,
    extra: Pick<IndexEntryInput, "location" | "patterns"> = {}
  ): EmbeddingVector {
    this.apply([{ kind: "insert", entry: { fragmentId, vector, disposition, ...extra } }]);
    const entry = this.current.get(fragmentId);
    if (!entry) throw new Error(`Inserted fragment ${fragmentId} is missing from the index.`);
    return entry;
  }

  remove(fragmentId: string): boolean {
    if (!this.current.has(fragmentId)) return false;
    this.apply([{ kind: "remove", fragmentId }]);
    return true;
  }

  query(vector: ArrayLike<number>, k: number): SimilarityMatch[] {
    return this.current.query(vector, k);
  }

  /**
   * Applies a batch and publishes it as one version. Every vector is checked
   * before anything is written, so a bad batch leaves the index untouched.
   */
  apply(mutations: readonly IndexMutation[]): IndexSnapshot {
    if (mutations.length === 0) return this.current;
    for (const mutation of mutations) {
      if (mutation.kind === "insert" && mutation.entry.vector.length !== this.dimensions) {
        throw new VectorDimensionMismatchError(this.dimensions, mutation.entry.vector.length);
      }
    }

    const byFragment = new Map<string, number>();
    this.current.entries().forEach((entry) => byFragment.set(entry.fragmentId, entry.handle));

    for (const mutation of mutations) {
      if (mutation.kind === "remove") {
        byFragment.delete(mutation.fragmentId);
        continue;
      }
      const { entry } = mutation;
      const previousHandle = byFragment.get(entry.fragmentId);
      const previous = previousHandle === undefined ? null : this.arena[previousHandle];
      const handle = this.arena.length;
      this.arena.push(
        Object.freeze({
          handle,
          // A replaced fragment keeps its place in tie-break order.
          seq: previous ? previous.seq : this.nextSeq++,
          fragmentId: entry.fragmentId,
          vector: normalizeVector(entry.vector),
          location: entry.location ? Object.freeze({ ...entry.location }) : null,
          disposition: entry.disposition ?? "unlabeled",
          patterns: Object.freeze([...(entry.patterns ?? [])])
        })
      );
      byFragment.set(entry.fragmentId, handle);
    }

    const live = [...byFragment.values()].sort((a, b) => this.arena[a].seq - this.arena[b].seq);
    this.publish(live, byFragment);
    this.compactIfNeeded();
    return this.current;
  }

  compact(): boolean {
    if (this.deadSlots === 0) return false;
    const arena: EmbeddingVector[] = [];
    const byFragment = new Map<string, number>();
    for (const entry of this.current.entries()) {
      const handle = arena.length;
      arena.push(Object.freeze({ ...entry, handle }));
      byFragment.set(entry.fragmentId, handle);
    }
    this.arena = arena;
    this.publish(
      arena.map((entry) => entry.handle),
      byFragment
    );
    return true;
  }

  private compactIfNeeded(): void {
    const slots = this.arena.length;
    if (slots < this.minCompactionSlots) return;
    if (this.deadSlots / slots > this.compactionThreshold) this.compact();
  }

  private publish(live: number[], byFragment: Map<string, number>): void {
    this.current = new IndexSnapshot(
      this.current.version + 1,
      this.dimensions,
      this.arena,
      Object.freeze(live),
      byFragment
    );
  }
}
