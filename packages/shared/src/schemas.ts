import { z } from "zod";

// ============================================================
// Raw metadata (as extracted by yt-dlp / platform scrapers)
// ============================================================

export const RawVideoInfoSchema = z.object({
    id: z.string(),
    title: z.string().nullish(),
    description: z.string().nullish(),
    duration: z.number().nullish(),
    thumbnail: z.string().nullish(),
    channel: z.string().nullish(),
    uploader: z.string().nullish(),
    channel_id: z.string().nullish(),
    uploader_id: z.string().nullish(),
    channel_url: z.string().nullish(),
    uploader_url: z.string().nullish(),
    webpage_url: z.string().nullish(),
    url: z.string().nullish(),
    upload_date: z.string().nullish(),
});

// ============================================================
// Video Record (input to classification)
// ============================================================

export const VideoRecordSchema = z.object({
    videoId: z.string().min(1),
    title: z.string().nullish().transform(v => v ?? ""),
    description: z.string().nullish(),
    duration: z.number().nullish(), // seconds
    channelName: z.string().nullish(),
    channelId: z.string().nullish(),
    thumbnailUrl: z.string().nullish(),
    videoUrl: z.string().nullish(),
    uploadDate: z.string().nullish(),
});

// ============================================================
// Classification Result
// ============================================================

export const ContentTypeSchema = z.enum(["PREACHING", "MUSIC", "UNKNOWN"]);

export const LanguageSchema = z.enum(["FRENCH", "ENGLISH", "UNKNOWN"]);

export const ChannelTrustLevelSchema = z.union([
    z.literal(0), // unknown
    z.literal(1), // known
    z.literal(2), // trusted
    z.literal(3), // verified
]);

export const ClassificationRuleSchema = z.enum([
    "verified_channel",
    "strong_music",
    "unknown_channel",
    "no_personal_name",
    "face_verified",
    "music_keywords",
    "strict_identity",
    "insufficient_signals",
    "strong_preaching_identity",
    "identity_keywords",
    "trusted_channel_keywords",
    "music_margin",
    "preaching_without_identity",
    "short_duration",
    "uncertain",
    "manual_review",
]);

export const ClassificationResultSchema = z.object({
    videoId: z.string(),
    contentType: ContentTypeSchema,
    confidenceScore: z.number().min(0).max(1),
    needsReview: z.boolean(),
    identityMatched: z.boolean(),
    channelTrustLevel: ChannelTrustLevelSchema,
    faceVerified: z.boolean(),
    languageDetected: LanguageSchema,

    // Which rule decided, and why
    rule: ClassificationRuleSchema,
    reasons: z.array(z.string()),
});

// A stored row: the video plus its last verdict (input to reclassification)
export const ClassifiedVideoSchema = VideoRecordSchema.extend({
    classification: ClassificationResultSchema.omit({ videoId: true, rule: true, reasons: true }),
});

// ============================================================
// Face Verification
// ============================================================

export const FaceVerificationSchema = z.object({
    verified: z.boolean(),
    confidence: z.number().min(0).max(1),
    source: z.string(), // "thumbnail", "frame_1", "none", ...
    distance: z.number().optional(),
    model: z.string().optional(),
    error: z.string().optional(),
});

// ============================================================
// Classifier Settings
// ============================================================

const wordList = z.array(z.string()).default([]);

export const ChannelTrustTiersSchema = z.object({
    verified: wordList,
    trusted: wordList,
    known: wordList,
});

export const DurationThresholdsSchema = z.object({
    shortClip: z.number().int().nonnegative(),
    maxMusic: z.number().int().nonnegative(),
    minSermon: z.number().int().nonnegative(),
    likelySermon: z.number().int().nonnegative(),
}).refine(
    t => t.shortClip <= t.maxMusic && t.maxMusic <= t.minSermon && t.minSermon <= t.likelySermon,
    { message: "Duration thresholds must be ordered shortClip <= maxMusic <= minSermon <= likelySermon" },
);

export const IdentityMarkersSchema = z.object({
    requiredNames: wordList,
    acceptableNames: wordList,
    churchNames: wordList,
});

export const LexiconSchema = z.object({
    preachingKeywords: wordList,
    strongPreachingKeywords: wordList,
    musicKeywords: wordList,
    strongMusicIndicators: wordList,
    frenchWords: wordList,
    englishWords: wordList,
    frenchCues: wordList,
    englishCues: wordList,
});

export const ClassifierSettingsSchema = IdentityMarkersSchema
    .merge(LexiconSchema)
    .extend({
        requirePersonalName: z.boolean().default(true),
        strictMode: z.boolean().default(true),
        faceRequiredForUnknownChannels: z.boolean().default(true),
        channelTrustTiers: ChannelTrustTiersSchema,
        strictChannels: wordList,
        durationThresholds: DurationThresholdsSchema,
        minFaceConfidence: z.number().min(0).max(1).default(0.7),
        reviewConfidenceThreshold: z.number().min(0).max(1).default(0.7),
    });

// Target profile data file (identity markers + channel lists)
export const TargetProfileDataSchema = IdentityMarkersSchema.extend({
    channelTrustTiers: ChannelTrustTiersSchema,
    strictChannels: wordList,
});

// A speaker described by name; markers are generated from it
export const SpeakerProfileSchema = z.object({
    name: z.string().min(1),
    title: z.string().optional(),
    aliases: z.array(z.string()).default([]),
    primaryChurch: z.string().optional(),
});

// ============================================================
// Human Review Schemas
// ============================================================

export const ReviewActionSchema = z.object({
    videoId: z.string(),
    action: z.enum(["confirm", "override"]),
    newContentType: ContentTypeSchema.optional(),
}).refine(a => a.action !== "override" || a.newContentType !== undefined, {
    message: "An override needs a newContentType",
    path: ["newContentType"],
});
