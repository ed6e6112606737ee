import type { DurationThresholds } from "@sermon-sieve/shared";

export const DURATION_SCORES = {
    likelySermon: 0.25,
    sermon: 0.15,
    neutral: 0.0,
    shortClip: -0.5,
    short: -0.3,
} as const;

/**
 * Duration is a secondary signal: positive leans preaching, negative leans
 * music, and no value here can decide a classification alone.
 */
export function scoreDuration(seconds: number | null | undefined, thresholds: DurationThresholds): number {
    if (seconds == null || !Number.isFinite(seconds) || seconds < 0) return DURATION_SCORES.neutral;

    if (seconds >= thresholds.likelySermon) return DURATION_SCORES.likelySermon;
    if (seconds >= thresholds.minSermon) return DURATION_SCORES.sermon;
    if (seconds > thresholds.maxMusic) return DURATION_SCORES.neutral;
    if (seconds <= thresholds.shortClip) return DURATION_SCORES.shortClip;
    return DURATION_SCORES.short;
}
