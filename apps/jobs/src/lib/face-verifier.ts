import { readdir, readFile } from "fs/promises";
import { extname, join } from "path";
import type { VideoRecord, FaceVerification } from "@sermon-sieve/shared";

// ============================================================
// Contract
// ============================================================

/**
 * Decides whether the target speaker's face appears in a video.
 * Detecting *a* face is not verifying *the* face: only implementations that
 * compare against reference photos may ever report verified=true.
 */
export interface FaceVerifier {
    verify(video: VideoRecord): Promise<FaceVerification>;
}

/** Compares one image against one reference photo. */
export interface FaceComparator {
    readonly model: string;
    compare(image: Uint8Array, reference: ReferencePhoto): Promise<{ verified: boolean; distance: number }>;
}

/** Reports whether any face is present. Carries no identity information. */
export interface FaceDetector {
    detect(image: Uint8Array): Promise<boolean>;
}

/** Pulls still frames out of the first part of a video. */
export interface FrameExtractor {
    extract(videoUrl: string, count: number): Promise<Uint8Array[]>;
}

export type ImageLoader = (url: string) => Promise<Uint8Array>;

export interface ReferencePhoto {
    filename: string;
    path: string;
    data: Uint8Array;
}

export const NOT_VERIFIED: Readonly<FaceVerification> = Object.freeze({
    verified: false,
    confidence: 0,
    source: "none",
});

// Confidence reported by detection-only verifiers when they do see a face
export const DETECTION_ONLY_CONFIDENCE = 0.20;

const DEFAULT_NUM_FRAMES = 5;
const IMAGE_DOWNLOAD_TIMEOUT_MS = 15_000;
const REFERENCE_EXTENSIONS = new Set([".jpg", ".jpeg", ".png"]);

// ============================================================
// Helpers
// ============================================================

/**
 * Load reference photos of the target speaker from a directory.
 * A missing directory yields no references (the verifier then never verifies).
 */
export async function loadReferencePhotos(dir: string): Promise<ReferencePhoto[]> {
    let entries: string[];
    try {
        entries = await readdir(dir);
    } catch (error) {
        if (isMissingFile(error)) {
            console.warn(`⚠️  Photos directory '${dir}' not found.`);
            return [];
        }
        throw error;
    }

    const photos: ReferencePhoto[] = [];
    for (const filename of entries.sort()) {
        if (!REFERENCE_EXTENSIONS.has(extname(filename).toLowerCase())) continue;
        const path = join(dir, filename);
        photos.push({ filename, path, data: await readFile(path) });
    }

    if (photos.length === 0) console.warn(`⚠️  No reference images found in '${dir}'.`);
    return photos;
}

export async function fetchImage(url: string): Promise<Uint8Array> {
    const res = await fetch(url, { signal: AbortSignal.timeout(IMAGE_DOWNLOAD_TIMEOUT_MS) });
    if (!res.ok) throw new Error(`Failed to download image: ${res.status} ${res.statusText}`);
    return new Uint8Array(await res.arrayBuffer());
}

export function cosineDistance(a: readonly number[], b: readonly number[]): number {
    if (a.length !== b.length) {
        throw new Error(`Embedding size mismatch: ${a.length} vs ${b.length}`);
    }
    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }
    if (normA === 0 || normB === 0) return 1;
    return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * The engine's own check on a verifier's claim: confidence is clamped to
 * [0, 1] and a verified claim below the minimum confidence is downgraded.
 */
export function revalidateFace(result: FaceVerification | undefined, minConfidence: number): FaceVerification {
    if (!result) return { ...NOT_VERIFIED };

    const confidence = Number.isFinite(result.confidence) ? Math.min(1, Math.max(0, result.confidence)) : 0;
    return {
        ...result,
        confidence,
        verified: result.verified && confidence >= minConfidence,
    };
}

// ============================================================
// Implementations
// ============================================================

/** Used when no face backend is configured. Never verifies. */
export class NoopFaceVerifier implements FaceVerifier {
    async verify(): Promise<FaceVerification> {
        return { ...NOT_VERIFIED };
    }
}

/**
 * Comparator backed by a face-embedding model. The model itself is injected;
 * references are embedded once and cached by path.
 */
export class EmbeddingFaceComparator implements FaceComparator {
    readonly model: string;
    private readonly distanceThreshold: number;
    private readonly referenceEmbeddings = new Map<string, Promise<number[] | null>>();

    constructor(
        private readonly embed: (image: Uint8Array) => Promise<number[] | null>,
        options: { model?: string; distanceThreshold?: number } = {}
    ) {
        this.model = options.model ?? "embedding";
        this.distanceThreshold = options.distanceThreshold ?? 0.40; // lower = stricter
    }

    async compare(image: Uint8Array, reference: ReferencePhoto): Promise<{ verified: boolean; distance: number }> {
        let cached = this.referenceEmbeddings.get(reference.path);
        if (!cached) {
            // A failed embedding is dropped so the next comparison retries it
            cached = this.embed(reference.data).catch(error => {
                this.referenceEmbeddings.delete(reference.path);
                throw error;
            });
            this.referenceEmbeddings.set(reference.path, cached);
        }

        const [face, ref] = await Promise.all([this.embed(image), cached]);
        if (!face || !ref) return { verified: false, distance: 1 };

        const distance = cosineDistance(face, ref);
        return { verified: distance <= this.distanceThreshold, distance };
    }
}

export interface ReferenceFaceVerifierOptions {
    references: ReferencePhoto[];
    comparator: FaceComparator;
    loadImage?: ImageLoader;
    frameExtractor?: FrameExtractor;
    numFrames?: number;
}

/**
 * Biometric verification against reference photos: thumbnail first (fast
 * path), then extracted frames.
 */
export class ReferenceFaceVerifier implements FaceVerifier {
    private readonly loadImage: ImageLoader;
    private readonly numFrames: number;

    constructor(private readonly options: ReferenceFaceVerifierOptions) {
        this.loadImage = options.loadImage ?? fetchImage;
        this.numFrames = options.numFrames ?? DEFAULT_NUM_FRAMES;
    }

    get referenceCount(): number {
        return this.options.references.length;
    }

    async verify(video: VideoRecord): Promise<FaceVerification> {
        if (this.options.references.length === 0) {
            return { ...NOT_VERIFIED, error: "No reference photos loaded" };
        }

        const errors: string[] = [];

        // 1. Thumbnail
        if (video.thumbnailUrl) {
            try {
                const image = await this.loadImage(video.thumbnailUrl);
                const result = await this.compareAgainstReferences(image, "thumbnail");
                if (result.verified) return result;
            } catch (error) {
                errors.push(`Thumbnail verification error: ${errorMessage(error)}`);
            }
        }

        // 2. Video frames
        const { frameExtractor } = this.options;
        if (frameExtractor && video.videoUrl) {
            try {
                const frames = await frameExtractor.extract(video.videoUrl, this.numFrames);
                for (let i = 0; i < frames.length; i++) {
                    const result = await this.compareAgainstReferences(frames[i], `frame_${i + 1}`);
                    if (result.verified) return result;
                }
            } catch (error) {
                errors.push(`Frame verification error: ${errorMessage(error)}`);
            }
        }

        return {
            ...NOT_VERIFIED,
            error: errors[0] ?? "Face not found in thumbnail or video frames",
        };
    }

    private async compareAgainstReferences(image: Uint8Array, source: string): Promise<FaceVerification> {
        const { comparator, references } = this.options;
        let bestDistance = Number.POSITIVE_INFINITY;
        let failures = 0;

        for (const reference of references) {
            try {
                const { verified, distance } = await comparator.compare(image, reference);
                bestDistance = Math.min(bestDistance, distance);
                if (verified) {
                    return {
                        verified: true,
                        confidence: Math.max(0, 1 - distance) * 0.98,
                        source,
                        distance,
                        model: comparator.model,
                    };
                }
            } catch (error) {
                // One unreadable reference should not stop the others
                failures++;
                if (failures === references.length) throw error;
            }
        }

        return {
            verified: false,
            confidence: Math.max(0, 1 - bestDistance) * 0.5,
            source,
            distance: Number.isFinite(bestDistance) ? bestDistance : undefined,
            model: comparator.model,
        };
    }
}

export interface DetectionOnlyFaceVerifierOptions {
    detector: FaceDetector;
    loadImage?: ImageLoader;
    frameExtractor?: FrameExtractor;
    numFrames?: number;
}

/**
 * Fallback when no reference comparison is possible. It can tell that a face
 * is present, never whose face it is, so it never reports verified=true.
 */
export class DetectionOnlyFaceVerifier implements FaceVerifier {
    private readonly loadImage: ImageLoader;
    private readonly numFrames: number;

    constructor(private readonly options: DetectionOnlyFaceVerifierOptions) {
        this.loadImage = options.loadImage ?? fetchImage;
        this.numFrames = options.numFrames ?? DEFAULT_NUM_FRAMES;
    }

    async verify(video: VideoRecord): Promise<FaceVerification> {
        const errors: string[] = [];
        const source = await this.findFace(video, errors);
        if (!source) {
            return { ...NOT_VERIFIED, error: errors[0] ?? "No faces detected in thumbnail or video frames" };
        }

        return {
            verified: false,
            confidence: DETECTION_ONLY_CONFIDENCE,
            source: `${source} (detection only)`,
            distance: 0.8,
            model: "detection only",
            error: "Face detected but NOT verified against reference photos",
        };
    }

    private async findFace(video: VideoRecord, errors: string[]): Promise<string | null> {
        const { detector, frameExtractor } = this.options;

        if (video.thumbnailUrl) {
            try {
                const image = await this.loadImage(video.thumbnailUrl);
                if (await detector.detect(image)) return "thumbnail";
            } catch (error) {
                errors.push(`Thumbnail detection error: ${errorMessage(error)}`);
            }
        }

        if (frameExtractor && video.videoUrl) {
            try {
                const frames = await frameExtractor.extract(video.videoUrl, this.numFrames);
                for (let i = 0; i < frames.length; i++) {
                    if (await detector.detect(frames[i])) return `frame_${i + 1}`;
                }
            } catch (error) {
                errors.push(`Frame detection error: ${errorMessage(error)}`);
            }
        }

        return null;
    }
}

// ============================================================
// Construction & boundary
// ============================================================

export interface FaceVerifierOptions {
    references?: ReferencePhoto[];
    comparator?: FaceComparator;
    detector?: FaceDetector;
    loadImage?: ImageLoader;
    frameExtractor?: FrameExtractor;
    numFrames?: number;
}

/**
 * Pick the strongest verifier the available capabilities allow.
 */
export function createFaceVerifier(options: FaceVerifierOptions = {}): FaceVerifier {
    const { references, comparator, detector, ...rest } = options;

    if (comparator && references && references.length > 0) {
        return new ReferenceFaceVerifier({ references, comparator, ...rest });
    }
    if (detector) {
        return new DetectionOnlyFaceVerifier({ detector, ...rest });
    }
    return new NoopFaceVerifier();
}

export const DEFAULT_FACE_VERIFY_TIMEOUT_MS = 30_000;

/**
 * Wrap a verifier so that it always settles with a result: exceptions and
 * timeouts become "not verified" with the error recorded. The classifier never
 * distinguishes a failed verification from a non-match.
 */
export function guardFaceVerifier(
    verifier: FaceVerifier,
    options: { timeoutMs?: number } = {}
): FaceVerifier {
    const timeoutMs = options.timeoutMs ?? DEFAULT_FACE_VERIFY_TIMEOUT_MS;

    return {
        async verify(video: VideoRecord): Promise<FaceVerification> {
            let timer: NodeJS.Timeout | undefined;
            const timeout = new Promise<never>((_, reject) => {
                timer = setTimeout(
                    () => reject(new Error(`Face verification timed out after ${timeoutMs}ms`)),
                    timeoutMs
                );
            });

            try {
                return await Promise.race([verifier.verify(video), timeout]);
            } catch (error) {
                const message = errorMessage(error);
                console.warn(`⚠️  Face verification failed for ${video.videoId}: ${message}`);
                return { ...NOT_VERIFIED, error: message };
            } finally {
                clearTimeout(timer);
            }
        },
    };
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && "code" in error && error.code === "ENOENT";
}
