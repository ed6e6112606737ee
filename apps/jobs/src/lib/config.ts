import {
    ClassifierSettingsSchema,
    DEFAULT_LEXICON,
    DEFAULT_TARGET_PROFILE,
    DEFAULT_DURATION_THRESHOLDS,
    generateIdentityMarkers,
} from "@sermon-sieve/shared";
import type { ClassifierSettings, ClassifierSettingsInput, SpeakerProfile } from "@sermon-sieve/shared";
import type { FaceVerifier } from "./face-verifier.js";
import { ConfigError, formatZodIssues } from "./errors.js";

/**
 * Everything the classifier reads. Built once by createClassifierConfig and
 * frozen, so the same object can be shared by any number of concurrent calls.
 */
export type ClassifierConfig = Readonly<ClassifierSettings> & {
    /** Absent means every video is treated as not face-verified. */
    readonly faceVerifier?: FaceVerifier;
};

export type ClassifierConfigOverrides = Partial<ClassifierSettingsInput> & {
    /**
     * Generate identity markers from a speaker instead of the default target.
     * Channel tiers and strict channels are not per speaker: pass them explicitly.
     */
    profile?: SpeakerProfile;
    faceVerifier?: FaceVerifier;
};

const WORD_LIST_KEYS = [
    "requiredNames",
    "acceptableNames",
    "churchNames",
    "preachingKeywords",
    "strongPreachingKeywords",
    "musicKeywords",
    "strongMusicIndicators",
    "frenchWords",
    "englishWords",
    "frenchCues",
    "englishCues",
    "strictChannels",
] as const;

export function defaultClassifierSettings(): ClassifierSettingsInput {
    return {
        ...DEFAULT_LEXICON,
        requiredNames: DEFAULT_TARGET_PROFILE.requiredNames,
        acceptableNames: DEFAULT_TARGET_PROFILE.acceptableNames,
        churchNames: DEFAULT_TARGET_PROFILE.churchNames,
        channelTrustTiers: DEFAULT_TARGET_PROFILE.channelTrustTiers,
        strictChannels: DEFAULT_TARGET_PROFILE.strictChannels,
        durationThresholds: DEFAULT_DURATION_THRESHOLDS,
    };
}

/**
 * Merge overrides over the defaults, validate once, normalize word lists
 * (trimmed, lower-cased, de-duplicated) and freeze the result.
 */
export function createClassifierConfig(overrides: ClassifierConfigOverrides = {}): ClassifierConfig {
    const { profile, faceVerifier, ...settings } = overrides;

    const merged: ClassifierSettingsInput = {
        ...defaultClassifierSettings(),
        ...(profile ? generateIdentityMarkers(profile) : {}),
        ...settings,
    };

    const parsed = ClassifierSettingsSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ConfigError("Invalid classifier configuration", formatZodIssues(parsed.error));
    }

    const normalized: ClassifierSettings = { ...parsed.data };
    for (const key of WORD_LIST_KEYS) {
        normalized[key] = normalizeWords(parsed.data[key]);
    }
    normalized.channelTrustTiers = {
        verified: normalizeWords(parsed.data.channelTrustTiers.verified),
        trusted: normalizeWords(parsed.data.channelTrustTiers.trusted),
        known: normalizeWords(parsed.data.channelTrustTiers.known),
    };

    return deepFreeze({ ...normalized, faceVerifier });
}

function normalizeWords(words: string[]): string[] {
    return [...new Set(words.map(w => w.trim().toLowerCase()).filter(w => w.length > 0))];
}

// Freeze plain data only; the face verifier is a live collaborator
function deepFreeze(config: ClassifierConfig): ClassifierConfig {
    for (const key of WORD_LIST_KEYS) Object.freeze(config[key]);
    Object.freeze(config.channelTrustTiers.verified);
    Object.freeze(config.channelTrustTiers.trusted);
    Object.freeze(config.channelTrustTiers.known);
    Object.freeze(config.channelTrustTiers);
    Object.freeze(config.durationThresholds);
    return Object.freeze(config);
}
