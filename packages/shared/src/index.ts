// Schema exports
export {
    RawVideoInfoSchema,
    VideoRecordSchema,
    ContentTypeSchema,
    LanguageSchema,
    ChannelTrustLevelSchema,
    ClassificationRuleSchema,
    ClassificationResultSchema,
    ClassifiedVideoSchema,
    FaceVerificationSchema,
    ChannelTrustTiersSchema,
    DurationThresholdsSchema,
    IdentityMarkersSchema,
    LexiconSchema,
    ClassifierSettingsSchema,
    TargetProfileDataSchema,
    SpeakerProfileSchema,
    ReviewActionSchema,
} from "./schemas";

// Type exports
export type {
    RawVideoInfo,
    VideoRecord,
    VideoRecordInput,
    ContentType,
    Language,
    ChannelTrustLevel,
    ClassificationRule,
    ClassificationResult,
    ClassifiedVideo,
    FaceVerification,
    ChannelTrustTiers,
    DurationThresholds,
    IdentityMarkers,
    Lexicon,
    ClassifierSettings,
    ClassifierSettingsInput,
    TargetProfileData,
    SpeakerProfile,
    ReviewAction,
} from "./types";

// Defaults
export { DEFAULT_LEXICON, DEFAULT_TARGET_PROFILE, DEFAULT_DURATION_THRESHOLDS } from "./defaults";

// Utility exports
export { normalizeVideo, formatDuration, applyReviewAction } from "./utils";
export { generateIdentityMarkers } from "./identity-markers";
