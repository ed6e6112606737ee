import type { z } from "zod";
import type {
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

// Raw platform metadata
export type RawVideoInfo = z.infer<typeof RawVideoInfoSchema>;

// Classification input / output
export type VideoRecord = z.infer<typeof VideoRecordSchema>;
export type VideoRecordInput = z.input<typeof VideoRecordSchema>;
export type ContentType = z.infer<typeof ContentTypeSchema>;
export type Language = z.infer<typeof LanguageSchema>;
export type ChannelTrustLevel = z.infer<typeof ChannelTrustLevelSchema>;
export type ClassificationRule = z.infer<typeof ClassificationRuleSchema>;
export type ClassificationResult = z.infer<typeof ClassificationResultSchema>;
export type ClassifiedVideo = z.infer<typeof ClassifiedVideoSchema>;
export type FaceVerification = z.infer<typeof FaceVerificationSchema>;

// Settings
export type ChannelTrustTiers = z.infer<typeof ChannelTrustTiersSchema>;
export type DurationThresholds = z.infer<typeof DurationThresholdsSchema>;
export type IdentityMarkers = z.infer<typeof IdentityMarkersSchema>;
export type Lexicon = z.infer<typeof LexiconSchema>;
export type ClassifierSettings = z.infer<typeof ClassifierSettingsSchema>;
export type ClassifierSettingsInput = z.input<typeof ClassifierSettingsSchema>;
export type TargetProfileData = z.infer<typeof TargetProfileDataSchema>;
export type SpeakerProfile = z.infer<typeof SpeakerProfileSchema>;

// Human review types
export type ReviewAction = z.infer<typeof ReviewActionSchema>;
