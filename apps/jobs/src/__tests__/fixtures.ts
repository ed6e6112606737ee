import type { VideoRecord, FaceVerification } from "@sermon-sieve/shared";

// Helper to create a dummy video
export function createVideo(overrides: Partial<VideoRecord> = {}): VideoRecord {
    return {
        videoId: "vid-001",
        title: "Untitled",
        description: undefined,
        duration: undefined,
        channelName: "Random Uploads 42",
        channelId: undefined,
        thumbnailUrl: undefined,
        videoUrl: undefined,
        uploadDate: undefined,
        ...overrides,
    };
}

export function createFace(overrides: Partial<FaceVerification> = {}): FaceVerification {
    return {
        verified: true,
        confidence: 0.9,
        source: "thumbnail",
        ...overrides,
    };
}
