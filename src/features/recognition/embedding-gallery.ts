import {
  UNKNOWN_LABEL,
  type GalleryEntry,
  type GallerySnapshot,
  type GalleryStats,
  type GalleryValidationReport,
  type OptimizeSummary,
} from "@/entities/face-gallery";
import { DimensionMismatchError, InvalidInputError } from "@/shared/lib/errors";
import { vectorKey } from "@/shared/lib/math";

const assertLabel = (label: string) => {
  if (!label.trim()) {
    throw new InvalidInputError("Identity label must not be empty");
  }
  if (label === UNKNOWN_LABEL) {
    throw new InvalidInputError(`"${UNKNOWN_LABEL}" is reserved for unmatched faces`);
  }
};

/**
 * The labeled embeddings usable for matching.
 *
 * Entries live in one array in global insertion order, which is also the
 * tie-break order for the matcher. Every write builds a new frozen array and
 * swaps it in with a single assignment, so a reader holding `entries()` never
 * sees a half-applied add, remove or optimize.
 */
export class EmbeddingGallery {
  private items: readonly GalleryEntry[] = [];
  private counts = new Map<string, number>();

  constructor(readonly dimension: number) {
    if (!Number.isInteger(dimension) || dimension <= 0) {
      throw new InvalidInputError(`Embedding dimension must be a positive integer, got ${dimension}`);
    }
  }

  static fromSnapshot(snapshot: GallerySnapshot, dimension: number): EmbeddingGallery {
    const gallery = new EmbeddingGallery(dimension);
    gallery.restore(snapshot);
    return gallery;
  }

  get size(): number {
    return this.items.length;
  }

  entries(): readonly GalleryEntry[] {
    return this.items;
  }

  labels(): string[] {
    return [...this.counts.keys()];
  }

  has(label: string): boolean {
    return this.counts.has(label);
  }

  countFor(label: string): number {
    return this.counts.get(label) ?? 0;
  }

  /** Throws DimensionMismatchError when the vector is not D long. */
  assertDimension(vector: number[]): void {
    if (vector.length !== this.dimension) {
      throw new DimensionMismatchError(this.dimension, vector.length);
    }
  }

  /**
   * Append every vector under `label`. All vectors are checked before any
   * is stored, so a bad vector leaves the gallery untouched.
   */
  add(label: string, embeddings: number[][]): number {
    this.commit(this.planAdd(label, embeddings));
    return embeddings.length;
  }

  /** Entries as they would be after `add`, without applying it. */
  planAdd(label: string, embeddings: number[][]): readonly GalleryEntry[] {
    assertLabel(label);
    for (const vector of embeddings) {
      this.assertDimension(vector);
    }

    const added = embeddings.map((vector) => Object.freeze({ label, vector: [...vector] }));
    return [...this.items, ...added];
  }

  /** Removes every embedding of `label`; returns how many were removed. */
  remove(label: string): number {
    const next = this.planRemove(label);
    const removed = this.items.length - next.length;
    if (removed > 0) {
      this.commit(next);
    }
    return removed;
  }

  planRemove(label: string): readonly GalleryEntry[] {
    return this.items.filter((entry) => entry.label !== label);
  }

  /**
   * Keep the first `maxPerIdentity` embeddings of each identity in insertion
   * order and drop the rest.
   */
  optimize(maxPerIdentity: number): OptimizeSummary {
    const next = this.planOptimize(maxPerIdentity);
    const summary = { before: this.items.length, after: next.length };
    if (summary.after !== summary.before) {
      this.commit(next);
    }
    return summary;
  }

  planOptimize(maxPerIdentity: number): readonly GalleryEntry[] {
    if (!Number.isInteger(maxPerIdentity) || maxPerIdentity < 1) {
      throw new InvalidInputError(`maxPerIdentity must be an integer >= 1, got ${maxPerIdentity}`);
    }

    const kept = new Map<string, number>();
    return this.items.filter((entry) => {
      const count = kept.get(entry.label) ?? 0;
      if (count >= maxPerIdentity) return false;
      kept.set(entry.label, count + 1);
      return true;
    });
  }

  /** Swap in a new entry list produced by one of the plan* methods. */
  commit(next: readonly GalleryEntry[]): void {
    const counts = new Map<string, number>();
    for (const entry of next) {
      counts.set(entry.label, (counts.get(entry.label) ?? 0) + 1);
    }
    this.items = Object.freeze([...next]);
    this.counts = counts;
  }

  snapshot(entries: readonly GalleryEntry[] = this.items): GallerySnapshot {
    return {
      version: "gallery-v1",
      entries: entries.map((entry) => ({ label: entry.label, vector: [...entry.vector] })),
      savedAt: new Date().toISOString(),
    };
  }

  /**
   * Replace the whole collection. Stored vectors are not dimension-checked
   * here so that validate() can report them; the matcher skips them.
   */
  restore(snapshot: GallerySnapshot): void {
    this.commit(snapshot.entries.map((entry) => Object.freeze({ label: entry.label, vector: [...entry.vector] })));
  }

  stats(): GalleryStats {
    return {
      totalEmbeddings: this.items.length,
      identityCount: this.counts.size,
      perIdentity: Object.fromEntries(this.counts),
    };
  }

  validate(): GalleryValidationReport {
    const errors: string[] = [];
    const warnings: string[] = [];

    const actual = new Map<string, number>();
    const seen = new Set<string>();
    let duplicates = 0;

    this.items.forEach((entry, index) => {
      actual.set(entry.label, (actual.get(entry.label) ?? 0) + 1);

      if (entry.vector.length !== this.dimension) {
        errors.push(`Invalid embedding dimension at index ${index}: ${entry.vector.length}`);
      }
      if (entry.vector.some((value) => !Number.isFinite(value))) {
        errors.push(`Non-finite value in embedding at index ${index}`);
      }

      const key = vectorKey(entry.vector);
      if (seen.has(key)) {
        duplicates += 1;
      }
      seen.add(key);
    });

    const labels = new Set([...actual.keys(), ...this.counts.keys()]);
    for (const label of labels) {
      const tracked = this.counts.get(label) ?? 0;
      const stored = actual.get(label) ?? 0;
      if (tracked !== stored) {
        errors.push(`Embedding count mismatch for "${label}": tracked ${tracked}, stored ${stored}`);
      }
    }

    if (duplicates > 0) {
      warnings.push(`Duplicate embeddings detected: ${duplicates}`);
    }

    return {
      valid: errors.length === 0,
      errors,
      warnings,
      totalEmbeddings: this.items.length,
      uniqueIdentities: actual.size,
    };
  }
}
