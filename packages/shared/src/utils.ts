import type {
    RawVideoInfo,
    VideoRecord,
    ClassificationResult,
    ReviewAction,
} from "./types";

const MAX_DESCRIPTION_LENGTH = 500;

/**
 * Normalize raw yt-dlp style metadata to our internal video record.
 */
export function normalizeVideo(raw: RawVideoInfo): VideoRecord {
    const videoId = raw.id;

    // Build video URL
    let videoUrl = raw.webpage_url || raw.url || undefined;
    if (!videoUrl && videoId) {
        videoUrl = `https://www.youtube.com/watch?v=${videoId}`;
    }

    const channelId = raw.channel_id || raw.uploader_id || undefined;

    // Truncate long descriptions
    let description = raw.description || "";
    if (description.length > MAX_DESCRIPTION_LENGTH) {
        description = description.slice(0, MAX_DESCRIPTION_LENGTH - 3) + "...";
    }

    return {
        videoId,
        title: raw.title ?? "",
        description,
        duration: raw.duration ?? undefined,
        channelName: raw.channel || raw.uploader || undefined,
        channelId,
        thumbnailUrl: raw.thumbnail ?? undefined,
        videoUrl,
        uploadDate: raw.upload_date ?? undefined,
    };
}

/**
 * Format a duration in seconds as H:MM:SS (or M:SS under an hour).
 */
export function formatDuration(seconds: number | null | undefined): string {
    if (seconds == null || !Number.isFinite(seconds) || seconds < 0) return "Unknown";

    const total = Math.floor(seconds);
    const hours = Math.floor(total / 3600);
    const minutes = Math.floor((total % 3600) / 60);
    const secs = total % 60;
    const pad = (n: number) => n.toString().padStart(2, "0");

    if (hours > 0) return `${hours}:${pad(minutes)}:${pad(secs)}`;
    return `${minutes}:${pad(secs)}`;
}

/**
 * Apply a human review decision to a stored verdict.
 * An override is the only path that may set PREACHING outside the engine.
 */
export function applyReviewAction(
    result: ClassificationResult,
    action: ReviewAction
): ClassificationResult {
    if (action.videoId !== result.videoId) {
        throw new Error(`Review action for ${action.videoId} applied to ${result.videoId}`);
    }

    if (action.action === "confirm") {
        return { ...result, needsReview: false, reasons: [...result.reasons, "Confirmed by reviewer"] };
    }

    const contentType = action.newContentType ?? result.contentType;
    return {
        ...result,
        contentType,
        confidenceScore: 1.0,
        needsReview: false,
        rule: "manual_review",
        reasons: [...result.reasons, `Overridden by reviewer to ${contentType}`],
    };
}
