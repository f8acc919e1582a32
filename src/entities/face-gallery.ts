export const UNKNOWN_LABEL = "Unknown";

// One stored vector and the identity that owns it
export interface GalleryEntry {
  label: string;
  vector: number[];
}

// Persisted form of the whole gallery, in insertion order
export interface GallerySnapshot {
  version: "gallery-v1";
  entries: GalleryEntry[];
  savedAt: string;
}

export interface RecognitionResult {
  label: string; // identity label or UNKNOWN_LABEL
  confidence: number; // 1 - distance, not clamped
  distance: number | null; // null when the gallery is empty
}

export interface GalleryStats {
  totalEmbeddings: number;
  identityCount: number;
  perIdentity: Record<string, number>;
}

export interface GalleryValidationReport {
  valid: boolean;
  errors: string[];
  warnings: string[];
  totalEmbeddings: number;
  uniqueIdentities: number;
}

export interface OptimizeSummary {
  before: number;
  after: number;
}

export interface RecognitionCounters {
  totalRecognitions: number;
  successfulRecognitions: number;
  unknownFaces: number;
  successRate: number; // percent
  unknownRate: number; // percent
  averageConfidence: number;
}

export interface RecognitionStatistics extends RecognitionCounters {
  registeredIdentities: number;
  totalEmbeddings: number;
}
