// Engine
export { classify, CONFIDENCE, SIGNAL_WEIGHTS, MIN_SIGNAL_TALLY } from "./lib/classifier.js";
export { createClassifierConfig, defaultClassifierSettings } from "./lib/config.js";
export type { ClassifierConfig, ClassifierConfigOverrides } from "./lib/config.js";

// Signals
export { matchIdentity, IDENTITY_BOOST } from "./lib/identity.js";
export type { IdentityMatch } from "./lib/identity.js";
export { resolveChannelTrust, isStrictChannel } from "./lib/channel-trust.js";
export { scoreDuration, DURATION_SCORES } from "./lib/duration.js";
export { detectLanguage } from "./lib/language.js";
export { countPreachingKeywords, countMusicKeywords, findStrongMusicIndicator } from "./lib/keywords.js";

// Face verification
export {
    NoopFaceVerifier,
    ReferenceFaceVerifier,
    DetectionOnlyFaceVerifier,
    EmbeddingFaceComparator,
    createFaceVerifier,
    guardFaceVerifier,
    revalidateFace,
    loadReferencePhotos,
    NOT_VERIFIED,
} from "./lib/face-verifier.js";
export type {
    FaceVerifier,
    FaceComparator,
    FaceDetector,
    FrameExtractor,
    ImageLoader,
    ReferencePhoto,
} from "./lib/face-verifier.js";

// Pipeline
export {
    ClassificationPipeline,
    classifyAll,
    summarizeClassifications,
    diffReclassification,
    parseVideoRecords,
    parseClassifiedVideos,
} from "./pipeline.js";
export type { ClassificationSummary, ReclassificationReport, PipelineOptions } from "./pipeline.js";
export { decideStorage } from "./lib/storage-policy.js";
export type { StorageDecision } from "./lib/storage-policy.js";

// Configuration & errors
export { loadEnv, readEnvSettings } from "./lib/env.js";
export { loadProfileOverrides } from "./lib/profile.js";
export { AppError, ConfigError, InvalidInputError } from "./lib/errors.js";
