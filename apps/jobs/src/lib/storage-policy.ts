import type { ClassificationResult } from "@sermon-sieve/shared";

export type StorageDecision =
    | "store"
    | "music_excluded"
    | "low_confidence_excluded"
    | "unknown_channel_rejected";

export const DEFAULT_MIN_STORAGE_CONFIDENCE = 0.50;

// Music at or below this confidence is kept for review instead of dropped
const MUSIC_EXCLUSION_CONFIDENCE = 0.50;

/**
 * Decide whether a verdict is worth keeping. Applied by the ingestion layer
 * after classification; the classifier itself never drops anything.
 */
export function decideStorage(
    result: ClassificationResult,
    minStorageConfidence = DEFAULT_MIN_STORAGE_CONFIDENCE
): StorageDecision {
    if (result.contentType === "MUSIC" && result.confidenceScore > MUSIC_EXCLUSION_CONFIDENCE) {
        return "music_excluded";
    }

    if (result.contentType === "UNKNOWN" && result.confidenceScore < minStorageConfidence) {
        return "low_confidence_excluded";
    }

    if (result.channelTrustLevel === 0 && !result.identityMatched && !result.faceVerified) {
        return "unknown_channel_rejected";
    }

    return "store";
}
