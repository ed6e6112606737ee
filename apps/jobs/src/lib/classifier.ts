import type {
    VideoRecord,
    ClassificationResult,
    ClassificationRule,
    ContentType,
    ChannelTrustLevel,
    FaceVerification,
    Language,
} from "@sermon-sieve/shared";
import type { ClassifierConfig } from "./config.js";
import { searchableText, countPreachingKeywords, countMusicKeywords, findStrongMusicIndicator } from "./keywords.js";
import { matchIdentity, type IdentityMatch } from "./identity.js";
import { resolveChannelTrust, isStrictChannel } from "./channel-trust.js";
import { scoreDuration } from "./duration.js";
import { detectLanguage } from "./language.js";
import { revalidateFace } from "./face-verifier.js";

// ============================================================
// Constants
// ============================================================

// Hand-tuned, not calibrated. Changing any of these changes stored verdicts.
export const CONFIDENCE = {
    verifiedChannel: 0.95,
    strongMusic: 0.95,
    unknownChannel: 0.20,
    noPersonalName: 0.25,
    faceVerified: 0.98,
    strictIdentity: 0.25,
    strictChannelDowngrade: 0.30,
} as const;

export const SIGNAL_WEIGHTS = {
    personalName: 2.0,
    preachingKeywords: 1.0,
    trustedChannel: 1.0,
    longDuration: 0.5,
} as const;

export const MIN_SIGNAL_TALLY = 2.0;
export const MIN_PREACHING_KEYWORDS = 3;
export const MIN_MUSIC_KEYWORDS = 2;
export const LONG_DURATION_SCORE = 0.15;
export const SHORT_DURATION_SCORE = -0.3;

// ============================================================
// Signals
// ============================================================

interface Signals {
    preachingScore: number;
    musicScore: number;
    durationScore: number;
    identity: IdentityMatch;
    trustLevel: ChannelTrustLevel;
    face: FaceVerification;
}

interface Verdict {
    contentType: ContentType;
    confidence: number;
    rule: ClassificationRule;
    reason: string;
    needsReview?: boolean;
}

// ============================================================
// Classification
// ============================================================

/**
 * Classify one video. Pure: the result depends only on the record, the
 * config and the face verification outcome passed in (absent = not verified).
 *
 * Rules run in a fixed order and the first terminal rule wins. The early
 * rules are safety gates that keep a sermon from being attributed to the
 * speaker without evidence; the later ones score among gated candidates.
 */
export function classify(
    video: VideoRecord,
    config: ClassifierConfig,
    face?: FaceVerification
): ClassificationResult {
    const text = searchableText(video);
    const identity = matchIdentity(text, config, config.requirePersonalName);
    const trustLevel = resolveChannelTrust(video.channelName, config.channelTrustTiers);
    const validatedFace = revalidateFace(face, config.minFaceConfidence);
    const languageDetected: Language = detectLanguage(text, config);

    const base = {
        videoId: video.videoId,
        identityMatched: identity.hasPersonalName,
        channelTrustLevel: trustLevel,
        faceVerified: validatedFace.verified,
        languageDetected,
    };

    const reasons: string[] = [];
    if (face?.verified && !validatedFace.verified) {
        reasons.push(`Face match rejected: confidence ${validatedFace.confidence.toFixed(2)} < ${config.minFaceConfidence}`);
    }

    // 1. Verified channel: only ever publishes the target speaker
    if (trustLevel === 3) {
        return {
            ...base,
            contentType: "PREACHING",
            confidenceScore: CONFIDENCE.verifiedChannel,
            needsReview: false,
            rule: "verified_channel",
            reasons: [...reasons, "Verified channel (trust level 3): auto-accepted"],
        };
    }

    // 2. Strong music indicator without a verified face
    const indicator = findStrongMusicIndicator(text, config);
    if (indicator && !validatedFace.verified) {
        return {
            ...base,
            contentType: "MUSIC",
            confidenceScore: CONFIDENCE.strongMusic,
            needsReview: false,
            rule: "strong_music",
            reasons: [...reasons, `Strong music indicator "${indicator}"`],
        };
    }

    const signals: Signals = {
        preachingScore: countPreachingKeywords(text, config),
        musicScore: countMusicKeywords(text, config),
        durationScore: scoreDuration(video.duration, config.durationThresholds),
        identity,
        trustLevel,
        face: validatedFace,
    };

    // 3. Hard gates: no name and no face never proceeds
    const gate = applyIdentityGates(signals, config);
    if (gate) {
        return {
            ...base,
            contentType: gate.contentType,
            confidenceScore: gate.confidence,
            needsReview: true,
            rule: gate.rule,
            reasons: [...reasons, gate.reason],
        };
    }

    // 4. Soft scoring among gated candidates
    const verdict = scoreSignals(signals, config);
    return finalize(base, verdict, video, config, reasons);
}

/**
 * Unknown channels without identity or face are rejected first, then any
 * video without the speaker's name unless a face was verified. Trust alone
 * never substitutes for identity.
 */
function applyIdentityGates(signals: Signals, config: ClassifierConfig): Verdict | null {
    const { identity, face, trustLevel } = signals;
    if (identity.hasPersonalName || face.verified) return null;

    if (trustLevel === 0 && config.faceRequiredForUnknownChannels) {
        return {
            contentType: "UNKNOWN",
            confidence: CONFIDENCE.unknownChannel,
            rule: "unknown_channel",
            reason: "Unknown channel with no identity marker and no verified face",
        };
    }

    return {
        contentType: "UNKNOWN",
        confidence: CONFIDENCE.noPersonalName,
        rule: "no_personal_name",
        reason: identity.tier === "church"
            ? `Church name "${identity.marker}" without the speaker's name`
            : "Speaker's name not found and no verified face",
    };
}

function signalTally(signals: Signals): number {
    let tally = 0;
    if (signals.identity.hasPersonalName) tally += SIGNAL_WEIGHTS.personalName;
    if (signals.preachingScore >= MIN_PREACHING_KEYWORDS) tally += SIGNAL_WEIGHTS.preachingKeywords;
    if (signals.trustLevel >= 2) tally += SIGNAL_WEIGHTS.trustedChannel;
    if (signals.durationScore >= LONG_DURATION_SCORE) tally += SIGNAL_WEIGHTS.longDuration;
    return tally;
}

function scoreSignals(signals: Signals, config: ClassifierConfig): Verdict {
    const { preachingScore: p, musicScore: m, durationScore: d, identity, trustLevel, face } = signals;
    const hasName = identity.hasPersonalName;
    const tally = signalTally(signals);

    // Face verification is decisive
    if (face.verified) {
        return {
            contentType: "PREACHING",
            confidence: CONFIDENCE.faceVerified,
            rule: "face_verified",
            reason: `Face verified (${face.source}, confidence ${face.confidence.toFixed(2)})`,
        };
    }

    if (m >= MIN_MUSIC_KEYWORDS && p === 0) {
        return {
            contentType: "MUSIC",
            confidence: Math.min(0.9, 0.6 + Math.abs(d) * 0.2),
            rule: "music_keywords",
            reason: `${m} music keywords and no preaching keywords`,
        };
    }

    if (config.strictMode && !hasName && trustLevel < 2) {
        return {
            contentType: "UNKNOWN",
            confidence: CONFIDENCE.strictIdentity,
            rule: "strict_identity",
            reason: "Strict mode: no identity marker on an untrusted channel",
            needsReview: true,
        };
    }

    if (tally < MIN_SIGNAL_TALLY) {
        return {
            contentType: "UNKNOWN",
            confidence: Math.max(0.30, 0.25 + tally * 0.1),
            rule: "insufficient_signals",
            reason: `Signal tally ${tally} below ${MIN_SIGNAL_TALLY}`,
            needsReview: true,
        };
    }

    // Ordered by specificity; the first match wins
    if (p >= MIN_PREACHING_KEYWORDS && m === 0 && hasName) {
        return {
            contentType: "PREACHING",
            confidence: Math.min(0.95, 0.75 + identity.boost + d * 0.1),
            rule: "strong_preaching_identity",
            reason: `Speaker's name with ${p} preaching keyword points and no music keywords`,
        };
    }

    if (hasName && p > m) {
        const confidence = 0.60 + identity.boost + (p - m) * 0.05 + d * 0.1;
        return {
            contentType: "PREACHING",
            confidence: clamp(confidence, 0.55, 0.90),
            rule: "identity_keywords",
            reason: `Speaker's name with preaching keywords ahead of music (${p} vs ${m})`,
        };
    }

    if (trustLevel >= 2 && p > m) {
        const confidence = 0.55 + (p - m) * 0.08 + d * 0.1;
        return {
            contentType: "PREACHING",
            confidence: clamp(confidence, 0.50, 0.85),
            rule: "trusted_channel_keywords",
            reason: `Trusted channel with preaching keywords ahead of music (${p} vs ${m})`,
        };
    }

    if (m > p + 1) {
        return {
            contentType: "MUSIC",
            confidence: clamp(0.5 + (m - p) * 0.1, 0.4, 0.85),
            rule: "music_margin",
            reason: `Music keywords ahead of preaching (${m} vs ${p})`,
        };
    }

    if (p > m + 1) {
        return {
            contentType: "UNKNOWN",
            confidence: Math.min(0.55, 0.40 + (p - m) * 0.05),
            rule: "preaching_without_identity",
            reason: `Preaching keywords ahead (${p} vs ${m}) but no identity`,
        };
    }

    if (d <= SHORT_DURATION_SCORE) {
        return {
            contentType: "MUSIC",
            confidence: 0.5 + Math.abs(d) * 0.15,
            rule: "short_duration",
            reason: "Short video with no clear keyword winner",
        };
    }

    if (p > m) return { contentType: "UNKNOWN", confidence: 0.40, rule: "uncertain", reason: "Preaching slightly ahead" };
    if (m > p) return { contentType: "MUSIC", confidence: 0.45, rule: "uncertain", reason: "Music slightly ahead" };
    return { contentType: "UNKNOWN", confidence: 0.30, rule: "uncertain", reason: "No clear winner" };
}

/**
 * Review flag and strict-channel downgrade for scored verdicts.
 */
function finalize(
    base: Omit<ClassificationResult, "contentType" | "confidenceScore" | "needsReview" | "rule" | "reasons">,
    verdict: Verdict,
    video: VideoRecord,
    config: ClassifierConfig,
    reasons: string[]
): ClassificationResult {
    let { contentType, confidence } = verdict;
    const notes = [...reasons, verdict.reason];
    let needsReview: boolean;

    if (isStrictChannel(video.channelName, config.strictChannels) && !base.faceVerified) {
        // Multi-speaker channel: a sermon verdict needs the face
        if (contentType === "PREACHING") {
            contentType = "UNKNOWN";
            confidence = CONFIDENCE.strictChannelDowngrade;
            notes.push("Strict channel without face verification: downgraded for review");
        }
        needsReview = true;
    } else {
        needsReview = confidence < config.reviewConfidenceThreshold && !base.faceVerified;
    }

    return {
        ...base,
        contentType,
        confidenceScore: confidence,
        needsReview: needsReview || verdict.needsReview === true,
        rule: verdict.rule,
        reasons: notes,
    };
}

function clamp(value: number, min: number, max: number): number {
    return Math.min(max, Math.max(min, value));
}
