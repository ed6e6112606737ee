import { describe, it, expect } from "vitest";
import { normalizeVideo, formatDuration, applyReviewAction } from "../utils";
import type { ClassificationResult } from "../types";

describe("normalizeVideo", () => {
    it("maps raw metadata to a video record", () => {
        const video = normalizeVideo({
            id: "abc",
            title: "Sunday Service",
            description: "Full service",
            duration: 3600,
            thumbnail: "https://img.example/abc.jpg",
            uploader: "Eglise Locale",
            uploader_id: "UC-local",
            webpage_url: "https://video.example/abc",
            upload_date: "20240107",
        });

        expect(video).toEqual({
            videoId: "abc",
            title: "Sunday Service",
            description: "Full service",
            duration: 3600,
            channelName: "Eglise Locale",
            channelId: "UC-local",
            thumbnailUrl: "https://img.example/abc.jpg",
            videoUrl: "https://video.example/abc",
            uploadDate: "20240107",
        });
    });

    it("prefers the channel fields over the uploader fields", () => {
        const video = normalizeVideo({ id: "abc", channel: "Main Channel", uploader: "Uploader", channel_id: "UC-main" });

        expect(video.channelName).toBe("Main Channel");
        expect(video.channelId).toBe("UC-main");
        expect(video.videoUrl).toBe("https://www.youtube.com/watch?v=abc");
    });

    it("truncates long descriptions to 500 characters", () => {
        const video = normalizeVideo({ id: "abc", description: "a".repeat(600) });

        expect(video.description).toHaveLength(500);
        expect(video.description?.endsWith("a...")).toBe(true);
    });
});

describe("formatDuration", () => {
    it("formats minutes and hours", () => {
        expect(formatDuration(65)).toBe("1:05");
        expect(formatDuration(3600)).toBe("1:00:00");
        expect(formatDuration(3725.9)).toBe("1:02:05");
        expect(formatDuration(0)).toBe("0:00");
    });

    it("reports unknown durations", () => {
        expect(formatDuration(undefined)).toBe("Unknown");
        expect(formatDuration(null)).toBe("Unknown");
        expect(formatDuration(-1)).toBe("Unknown");
    });
});

describe("applyReviewAction", () => {
    const result: ClassificationResult = {
        videoId: "abc",
        contentType: "UNKNOWN",
        confidenceScore: 0.3,
        needsReview: true,
        identityMatched: true,
        channelTrustLevel: 2,
        faceVerified: false,
        languageDetected: "ENGLISH",
        rule: "identity_keywords",
        reasons: ["Strict channel without face verification: downgraded for review"],
    };

    it("confirms a verdict", () => {
        const confirmed = applyReviewAction(result, { videoId: "abc", action: "confirm" });

        expect(confirmed.contentType).toBe("UNKNOWN");
        expect(confirmed.needsReview).toBe(false);
        expect(confirmed.reasons[confirmed.reasons.length - 1]).toBe("Confirmed by reviewer");
    });

    it("overrides a verdict with full confidence", () => {
        const overridden = applyReviewAction(result, { videoId: "abc", action: "override", newContentType: "PREACHING" });

        expect(overridden.contentType).toBe("PREACHING");
        expect(overridden.confidenceScore).toBe(1);
        expect(overridden.needsReview).toBe(false);
        expect(overridden.rule).toBe("manual_review");
        expect(overridden.reasons[overridden.reasons.length - 1]).toBe("Overridden by reviewer to PREACHING");
    });

    it("refuses an action for another video", () => {
        expect(() => applyReviewAction(result, { videoId: "xyz", action: "confirm" })).toThrow(
            "Review action for xyz applied to abc"
        );
    });
});
