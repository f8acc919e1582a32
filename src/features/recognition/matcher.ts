import { UNKNOWN_LABEL, type RecognitionCounters, type RecognitionResult } from "@/entities/face-gallery";
import { InvalidInputError } from "@/shared/lib/errors";
import { euclideanDistance, roundTo, safeDivide } from "@/shared/lib/math";
import type { EmbeddingGallery } from "./embedding-gallery";

const assertTolerance = (tolerance: number) => {
  if (!Number.isFinite(tolerance) || tolerance < 0) {
    throw new InvalidInputError(`Tolerance must be a finite number >= 0, got ${tolerance}`);
  }
};

/**
 * Nearest-neighbour match of `query` against every stored embedding.
 * The boundary is inclusive (distance <= tolerance) and ties go to the
 * earliest stored embedding.
 */
export const recognize = (
  gallery: EmbeddingGallery,
  query: number[],
  tolerance: number,
): RecognitionResult => {
  const entries = gallery.entries();
  if (entries.length === 0) {
    return { label: UNKNOWN_LABEL, confidence: 0, distance: null };
  }

  assertTolerance(tolerance);
  gallery.assertDimension(query);

  let bestIndex = -1;
  let bestDistance = Infinity;

  for (let i = 0; i < entries.length; i += 1) {
    const vector = entries[i].vector;
    // Restored vectors of the wrong size are reported by validate(), never matched
    if (vector.length !== query.length) continue;

    const distance = euclideanDistance(query, vector);
    if (distance < bestDistance) {
      bestDistance = distance;
      bestIndex = i;
    }
  }

  if (bestIndex < 0) {
    return { label: UNKNOWN_LABEL, confidence: 0, distance: null };
  }

  const confidence = 1 - bestDistance;
  if (bestDistance <= tolerance) {
    return { label: entries[bestIndex].label, confidence, distance: bestDistance };
  }
  return { label: UNKNOWN_LABEL, confidence, distance: bestDistance };
};

export const recognizeBatch = (
  gallery: EmbeddingGallery,
  queries: number[][],
  tolerance: number,
): RecognitionResult[] => queries.map((query) => recognize(gallery, query, tolerance));

/** Running counters for the recognitions made through one service handle. */
export class RecognitionStats {
  private total = 0;
  private successful = 0;
  private unknown = 0;
  private confidenceSum = 0;

  record(result: RecognitionResult): void {
    this.total += 1;
    if (result.label === UNKNOWN_LABEL) {
      this.unknown += 1;
      return;
    }
    this.successful += 1;
    this.confidenceSum += result.confidence;
  }

  snapshot(): RecognitionCounters {
    return {
      totalRecognitions: this.total,
      successfulRecognitions: this.successful,
      unknownFaces: this.unknown,
      successRate: roundTo(safeDivide(this.successful * 100, this.total), 2),
      unknownRate: roundTo(safeDivide(this.unknown * 100, this.total), 2),
      averageConfidence: roundTo(safeDivide(this.confidenceSum, this.successful), 4),
    };
  }

  reset(): void {
    this.total = 0;
    this.successful = 0;
    this.unknown = 0;
    this.confidenceSum = 0;
  }
}
