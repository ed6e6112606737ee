import { describe, it, expect, vi, afterEach } from "vitest";
import { mkdtemp, writeFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
    NoopFaceVerifier,
    ReferenceFaceVerifier,
    DetectionOnlyFaceVerifier,
    EmbeddingFaceComparator,
    createFaceVerifier,
    guardFaceVerifier,
    revalidateFace,
    cosineDistance,
    loadReferencePhotos,
    type FaceComparator,
    type FaceVerifier,
    type ReferencePhoto,
} from "../lib/face-verifier";
import type { FaceVerification } from "@sermon-sieve/shared";
import { createVideo } from "./fixtures";

const reference: ReferencePhoto = { filename: "speaker.jpg", path: "/refs/speaker.jpg", data: new Uint8Array([1]) };

// Image byte 7 is the speaker, anything else is someone else
const comparator: FaceComparator = {
    model: "fake-model",
    async compare(image) {
        return image[0] === 7 ? { verified: true, distance: 0.25 } : { verified: false, distance: 0.6 };
    },
};

const video = createVideo({ thumbnailUrl: "https://img.example/thumb.jpg", videoUrl: "https://video.example/v" });

afterEach(() => {
    vi.restoreAllMocks();
});

describe("revalidateFace", () => {
    it("treats a missing outcome as not verified", () => {
        expect(revalidateFace(undefined, 0.7)).toEqual({ verified: false, confidence: 0, source: "none" });
    });

    it("downgrades a claim below the minimum confidence", () => {
        const result = revalidateFace({ verified: true, confidence: 0.5, source: "thumbnail" }, 0.7);

        expect(result.verified).toBe(false);
        expect(result.confidence).toBe(0.5);
    });

    it("clamps confidence into range", () => {
        const result = revalidateFace({ verified: true, confidence: 1.4, source: "thumbnail" }, 0.7);

        expect(result.verified).toBe(true);
        expect(result.confidence).toBe(1);
    });
});

describe("ReferenceFaceVerifier", () => {
    it("verifies from the thumbnail", async () => {
        const verifier = new ReferenceFaceVerifier({
            references: [reference],
            comparator,
            loadImage: async () => new Uint8Array([7]),
        });

        const result = await verifier.verify(video);

        expect(result.verified).toBe(true);
        expect(result.source).toBe("thumbnail");
        expect(result.distance).toBe(0.25);
        expect(result.model).toBe("fake-model");
        expect(result.confidence).toBeCloseTo(0.735);
    });

    it("falls back to video frames when the thumbnail does not match", async () => {
        const verifier = new ReferenceFaceVerifier({
            references: [reference],
            comparator,
            loadImage: async () => new Uint8Array([9]),
            frameExtractor: { extract: async () => [new Uint8Array([9]), new Uint8Array([7])] },
        });

        const result = await verifier.verify(video);

        expect(result.verified).toBe(true);
        expect(result.source).toBe("frame_2");
    });

    it("reports not verified when nothing matches", async () => {
        const verifier = new ReferenceFaceVerifier({
            references: [reference],
            comparator,
            loadImage: async () => new Uint8Array([9]),
        });

        expect(await verifier.verify(video)).toEqual({
            verified: false,
            confidence: 0,
            source: "none",
            error: "Face not found in thumbnail or video frames",
        });
    });

    it("records a thumbnail download failure", async () => {
        const verifier = new ReferenceFaceVerifier({
            references: [reference],
            comparator,
            loadImage: async () => {
                throw new Error("HTTP 404");
            },
        });

        const result = await verifier.verify(video);

        expect(result.verified).toBe(false);
        expect(result.error).toBe("Thumbnail verification error: HTTP 404");
    });

    it("keeps the thumbnail error when frame extraction fails too", async () => {
        const verifier = new ReferenceFaceVerifier({
            references: [reference],
            comparator,
            loadImage: async () => {
                throw new Error("HTTP 404");
            },
            frameExtractor: {
                extract: async () => {
                    throw new Error("ffmpeg missing");
                },
            },
        });

        const result = await verifier.verify(video);

        expect(result.verified).toBe(false);
        expect(result.error).toBe("Thumbnail verification error: HTTP 404");
    });

    it("records a frame extraction failure", async () => {
        const verifier = new ReferenceFaceVerifier({
            references: [reference],
            comparator,
            frameExtractor: {
                extract: async () => {
                    throw new Error("ffmpeg missing");
                },
            },
        });

        const result = await verifier.verify(createVideo({ videoUrl: "https://video.example/v" }));

        expect(result).toEqual({
            verified: false,
            confidence: 0,
            source: "none",
            error: "Frame verification error: ffmpeg missing",
        });
    });

    it("never verifies without reference photos", async () => {
        const verifier = new ReferenceFaceVerifier({ references: [], comparator });

        const result = await verifier.verify(video);

        expect(result.verified).toBe(false);
        expect(result.error).toBe("No reference photos loaded");
    });
});

describe("DetectionOnlyFaceVerifier", () => {
    it("sees a face but never verifies it", async () => {
        const verifier = new DetectionOnlyFaceVerifier({
            detector: { detect: async () => true },
            loadImage: async () => new Uint8Array([1]),
        });

        const result = await verifier.verify(video);

        expect(result.verified).toBe(false);
        expect(result.confidence).toBe(0.2);
        expect(result.source).toBe("thumbnail (detection only)");
    });

    it("falls back to video frames when the thumbnail cannot be loaded", async () => {
        const verifier = new DetectionOnlyFaceVerifier({
            detector: { detect: async () => true },
            loadImage: async () => {
                throw new Error("404");
            },
            frameExtractor: { extract: async () => [new Uint8Array([1])] },
        });

        const result = await verifier.verify(video);

        expect(result.verified).toBe(false);
        expect(result.confidence).toBe(0.2);
        expect(result.source).toBe("frame_1 (detection only)");
    });

    it("reports the thumbnail error when no frames are available", async () => {
        const verifier = new DetectionOnlyFaceVerifier({
            detector: { detect: async () => true },
            loadImage: async () => {
                throw new Error("404");
            },
        });

        const result = await verifier.verify(video);

        expect(result.confidence).toBe(0);
        expect(result.error).toBe("Thumbnail detection error: 404");
    });

    it("reports when no face is present", async () => {
        const verifier = new DetectionOnlyFaceVerifier({
            detector: { detect: async () => false },
            loadImage: async () => new Uint8Array([1]),
        });

        const result = await verifier.verify(video);

        expect(result.confidence).toBe(0);
        expect(result.error).toBe("No faces detected in thumbnail or video frames");
    });
});

describe("EmbeddingFaceComparator", () => {
    it("compares by cosine distance and embeds each reference once", async () => {
        const embed = vi.fn(async (image: Uint8Array) => (image[0] === 1 || image[0] === 7 ? [1, 0] : [0, 1]));
        const embedding = new EmbeddingFaceComparator(embed, { model: "test-embedder" });

        const same = await embedding.compare(new Uint8Array([7]), reference);
        const other = await embedding.compare(new Uint8Array([9]), reference);

        expect(same).toEqual({ verified: true, distance: 0 });
        expect(other).toEqual({ verified: false, distance: 1 });
        expect(embed).toHaveBeenCalledTimes(3);
    });

    it("retries a reference whose embedding failed", async () => {
        let referenceCalls = 0;
        const embed = vi.fn(async (image: Uint8Array) => {
            if (image === reference.data && referenceCalls++ === 0) throw new Error("transient");
            return [1, 0];
        });
        const embedding = new EmbeddingFaceComparator(embed);

        await expect(embedding.compare(new Uint8Array([7]), reference)).rejects.toThrow("transient");
        expect(await embedding.compare(new Uint8Array([7]), reference)).toEqual({ verified: true, distance: 0 });
        expect(referenceCalls).toBe(2);
    });

    it("does not verify when no face can be embedded", async () => {
        const embedding = new EmbeddingFaceComparator(async () => null);

        expect(await embedding.compare(new Uint8Array([7]), reference)).toEqual({ verified: false, distance: 1 });
    });
});

describe("cosineDistance", () => {
    it("measures angle between embeddings", () => {
        expect(cosineDistance([1, 0], [0, 1])).toBe(1);
        expect(cosineDistance([1, 2], [2, 4])).toBeCloseTo(0);
        expect(cosineDistance([0, 0], [1, 1])).toBe(1);
    });

    it("rejects embeddings of different sizes", () => {
        expect(() => cosineDistance([1, 0], [1, 0, 0])).toThrow("Embedding size mismatch: 2 vs 3");
    });
});

describe("createFaceVerifier", () => {
    it("prefers reference comparison, then detection, then nothing", () => {
        const detector = { detect: async () => true };

        expect(createFaceVerifier({ references: [reference], comparator, detector })).toBeInstanceOf(ReferenceFaceVerifier);
        expect(createFaceVerifier({ references: [], comparator, detector })).toBeInstanceOf(DetectionOnlyFaceVerifier);
        expect(createFaceVerifier()).toBeInstanceOf(NoopFaceVerifier);
    });
});

describe("guardFaceVerifier", () => {
    it("turns a thrown error into not verified", async () => {
        vi.spyOn(console, "warn").mockImplementation(() => {});
        const failing: FaceVerifier = {
            verify: async () => {
                throw new Error("model crashed");
            },
        };

        const result = await guardFaceVerifier(failing).verify(video);

        expect(result).toEqual({ verified: false, confidence: 0, source: "none", error: "model crashed" });
    });

    it("turns a timeout into not verified", async () => {
        vi.spyOn(console, "warn").mockImplementation(() => {});
        const hanging: FaceVerifier = { verify: () => new Promise<FaceVerification>(() => {}) };

        const result = await guardFaceVerifier(hanging, { timeoutMs: 20 }).verify(video);

        expect(result.verified).toBe(false);
        expect(result.error).toBe("Face verification timed out after 20ms");
    });

    it("passes results through", async () => {
        const result = await guardFaceVerifier(new NoopFaceVerifier()).verify(video);

        expect(result).toEqual({ verified: false, confidence: 0, source: "none" });
    });
});

describe("loadReferencePhotos", () => {
    it("loads image files in name order", async () => {
        const dir = await mkdtemp(join(tmpdir(), "refs-"));
        try {
            await writeFile(join(dir, "b.png"), "b");
            await writeFile(join(dir, "notes.txt"), "not a photo");
            await writeFile(join(dir, "a.JPG"), "a");

            const photos = await loadReferencePhotos(dir);

            expect(photos.map(p => p.filename)).toEqual(["a.JPG", "b.png"]);
        } finally {
            await rm(dir, { recursive: true, force: true });
        }
    });

    it("returns nothing for a missing directory", async () => {
        const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

        expect(await loadReferencePhotos(join(tmpdir(), "no-such-reference-dir-xyz"))).toEqual([]);
        expect(warn).toHaveBeenCalledTimes(1);
    });
});
