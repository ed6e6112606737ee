import {
    VideoRecordSchema,
    RawVideoInfoSchema,
    ClassifiedVideoSchema,
    normalizeVideo,
} from "@sermon-sieve/shared";
import type {
    VideoRecord,
    ClassifiedVideo,
    ClassificationResult,
    ContentType,
    FaceVerification,
} from "@sermon-sieve/shared";
import { classify } from "./lib/classifier.js";
import type { ClassifierConfig } from "./lib/config.js";
import { guardFaceVerifier, type FaceVerifier } from "./lib/face-verifier.js";
import { decideStorage, DEFAULT_MIN_STORAGE_CONFIDENCE, type StorageDecision } from "./lib/storage-policy.js";
import { InvalidInputError, formatZodIssues } from "./lib/errors.js";

// ============================================================
// Input parsing
// ============================================================

/**
 * Parse a JSON array of video records. Each item may be a VideoRecord
 * (camelCase, with videoId) or raw yt-dlp metadata (with id).
 */
export function parseVideoRecords(data: unknown): VideoRecord[] {
    if (!Array.isArray(data)) throw new InvalidInputError("Expected a JSON array of videos");

    const issues: string[] = [];
    const videos: VideoRecord[] = [];

    data.forEach((item: unknown, index) => {
        const isRaw = item !== null && typeof item === "object" && "id" in item && !("videoId" in item);
        if (isRaw) {
            const raw = RawVideoInfoSchema.safeParse(item);
            if (raw.success) videos.push(normalizeVideo(raw.data));
            else issues.push(...formatZodIssues(raw.error, `[${index}]`));
            return;
        }

        const record = VideoRecordSchema.safeParse(item);
        if (record.success) videos.push(record.data);
        else issues.push(...formatZodIssues(record.error, `[${index}]`));
    });

    if (issues.length > 0) throw new InvalidInputError("Invalid video records", issues);
    return videos;
}

export function parseClassifiedVideos(data: unknown): ClassifiedVideo[] {
    if (!Array.isArray(data)) throw new InvalidInputError("Expected a JSON array of classified videos");

    const parsed = ClassifiedVideoSchema.array().safeParse(data);
    if (!parsed.success) throw new InvalidInputError("Invalid classified videos", formatZodIssues(parsed.error));
    return parsed.data;
}

// ============================================================
// Pure batch helpers
// ============================================================

/**
 * Classify many videos with face outcomes computed beforehand (keyed by
 * videoId). A plain map over independent records, safe to split across workers.
 */
export function classifyAll(
    videos: readonly VideoRecord[],
    config: ClassifierConfig,
    faces: ReadonlyMap<string, FaceVerification> = new Map()
): ClassificationResult[] {
    return videos.map(video => classify(video, config, faces.get(video.videoId)));
}

export interface ClassificationSummary {
    total: number;
    preaching: number;
    music: number;
    unknown: number;
    needsReview: number;
    highConfidence: number;
    lowConfidence: number;
    storage: Record<StorageDecision, number>;
}

export const HIGH_CONFIDENCE = 0.85;
export const LOW_CONFIDENCE = 0.45;

export function summarizeClassifications(
    results: readonly ClassificationResult[],
    minStorageConfidence = DEFAULT_MIN_STORAGE_CONFIDENCE
): ClassificationSummary {
    const summary: ClassificationSummary = {
        total: results.length,
        preaching: 0,
        music: 0,
        unknown: 0,
        needsReview: 0,
        highConfidence: 0,
        lowConfidence: 0,
        storage: { store: 0, music_excluded: 0, low_confidence_excluded: 0, unknown_channel_rejected: 0 },
    };

    for (const result of results) {
        if (result.contentType === "PREACHING") summary.preaching++;
        else if (result.contentType === "MUSIC") summary.music++;
        else summary.unknown++;

        if (result.needsReview) summary.needsReview++;

        if (result.confidenceScore >= HIGH_CONFIDENCE) summary.highConfidence++;
        else if (result.confidenceScore < LOW_CONFIDENCE) summary.lowConfidence++;

        summary.storage[decideStorage(result, minStorageConfidence)]++;
    }

    return summary;
}

export interface ReclassificationChange {
    videoId: string;
    title: string;
    from: { contentType: ContentType; confidenceScore: number };
    to: ClassificationResult;
}

export interface ReclassificationReport {
    processed: number;
    changed: ReclassificationChange[];
}

// A stored verdict is rewritten when its type changes or confidence moves more than this
export const RECLASSIFY_CONFIDENCE_DELTA = 0.1;

export function diffReclassification(
    previous: readonly ClassifiedVideo[],
    current: readonly ClassificationResult[]
): ReclassificationReport {
    const byId = new Map(current.map(r => [r.videoId, r]));
    const changed: ReclassificationChange[] = [];

    for (const video of previous) {
        const next = byId.get(video.videoId);
        if (!next) continue;

        const before = video.classification;
        if (
            next.contentType !== before.contentType ||
            Math.abs(next.confidenceScore - before.confidenceScore) > RECLASSIFY_CONFIDENCE_DELTA
        ) {
            changed.push({
                videoId: video.videoId,
                title: video.title,
                from: { contentType: before.contentType, confidenceScore: before.confidenceScore },
                to: next,
            });
        }
    }

    return { processed: previous.length, changed };
}

// ============================================================
// Pipeline (face verification out of band, then pure scoring)
// ============================================================

export interface PipelineOptions {
    faceVerifyTimeoutMs?: number;
    /** Maximum face verifications in flight. */
    concurrency?: number;
    /** Log each verdict as it is produced. */
    verbose?: boolean;
}

export class ClassificationPipeline {
    private readonly verifier: FaceVerifier | undefined;
    private readonly concurrency: number;
    private readonly verbose: boolean;

    constructor(
        readonly config: ClassifierConfig,
        options: PipelineOptions = {}
    ) {
        this.verifier = config.faceVerifier
            ? guardFaceVerifier(config.faceVerifier, { timeoutMs: options.faceVerifyTimeoutMs })
            : undefined;
        this.concurrency = Math.max(1, options.concurrency ?? 4);
        this.verbose = options.verbose ?? false;
    }

    async classifyVideo(video: VideoRecord): Promise<ClassificationResult> {
        const face = this.verifier ? await this.verifier.verify(video) : undefined;
        return this.report(video, classify(video, this.config, face));
    }

    /**
     * Run face verification for every video, at most `concurrency` at a time.
     * Returns nothing for any video when no verifier is configured.
     */
    async verifyFaces(videos: readonly VideoRecord[]): Promise<Map<string, FaceVerification>> {
        const results = new Map<string, FaceVerification>();
        const verifier = this.verifier;
        if (!verifier) return results;

        const queue = [...videos];
        const worker = async () => {
            for (let video = queue.shift(); video; video = queue.shift()) {
                results.set(video.videoId, await verifier.verify(video));
            }
        };

        await Promise.all(Array.from({ length: Math.min(this.concurrency, queue.length) }, worker));
        return results;
    }

    async classifyBatch(videos: readonly VideoRecord[]): Promise<ClassificationResult[]> {
        const faces = await this.verifyFaces(videos);
        const results = classifyAll(videos, this.config, faces);
        results.forEach((result, i) => this.report(videos[i], result));
        return results;
    }

    async reclassify(previous: readonly ClassifiedVideo[]): Promise<ReclassificationReport> {
        const current = await this.classifyBatch(previous);
        return diffReclassification(previous, current);
    }

    private report(video: VideoRecord, result: ClassificationResult): ClassificationResult {
        if (this.verbose) {
            const icon = result.contentType === "PREACHING" ? "✅" : result.contentType === "MUSIC" ? "🎵" : "❔";
            console.log(
                `${icon} ${result.contentType} ${result.confidenceScore.toFixed(2)} [${result.rule}] ${video.title.slice(0, 60)}`
            );
        }
        return result;
    }
}
