import { config } from "dotenv";
import { join, dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { ClassifierSettingsInput } from "@sermon-sieve/shared";
import { ConfigError, formatZodIssues } from "./errors.js";
import { DEFAULT_FACE_VERIFY_TIMEOUT_MS } from "./face-verifier.js";
import { DEFAULT_MIN_STORAGE_CONFIDENCE } from "./storage-policy.js";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

let isLoaded = false;

/**
 * Loads the .env file from the monorepo root, then from the CWD.
 * Can be called multiple times safely.
 */
export function loadEnv() {
    if (isLoaded) return;

    // apps/jobs/src/lib/env.ts -> repo root
    config({ path: join(__dirname, "../../../../.env") });
    config();

    isLoaded = true;
}

const booleanString = z.enum(["true", "false", "1", "0"]).transform(v => v === "true" || v === "1");

const EnvSchema = z.object({
    REVIEW_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).optional(),
    MIN_FACE_CONFIDENCE: z.coerce.number().min(0).max(1).optional(),
    STRICT_MODE: booleanString.optional(),
    REQUIRE_PERSONAL_NAME: booleanString.optional(),
    MIN_STORAGE_CONFIDENCE: z.coerce.number().min(0).max(1).default(DEFAULT_MIN_STORAGE_CONFIDENCE),
    FACE_VERIFY_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_FACE_VERIFY_TIMEOUT_MS),
    FACE_VERIFY_CONCURRENCY: z.coerce.number().int().positive().default(4),
    SPEAKER_PROFILE_PATH: z.string().min(1).optional(),
});

export interface EnvSettings {
    /** Classifier overrides; only keys set in the environment are present. */
    classifier: Partial<ClassifierSettingsInput>;
    minStorageConfidence: number;
    faceVerifyTimeoutMs: number;
    faceVerifyConcurrency: number;
    speakerProfilePath?: string;
}

/**
 * Read classifier and pipeline settings from the environment.
 */
export function readEnvSettings(env: NodeJS.ProcessEnv = process.env): EnvSettings {
    // Blank values count as unset
    const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ""));

    const parsed = EnvSchema.safeParse(present);
    if (!parsed.success) {
        throw new ConfigError("Invalid environment", formatZodIssues(parsed.error));
    }
    const e = parsed.data;

    const classifier: Partial<ClassifierSettingsInput> = {};
    if (e.REVIEW_CONFIDENCE_THRESHOLD !== undefined) classifier.reviewConfidenceThreshold = e.REVIEW_CONFIDENCE_THRESHOLD;
    if (e.MIN_FACE_CONFIDENCE !== undefined) classifier.minFaceConfidence = e.MIN_FACE_CONFIDENCE;
    if (e.STRICT_MODE !== undefined) classifier.strictMode = e.STRICT_MODE;
    if (e.REQUIRE_PERSONAL_NAME !== undefined) classifier.requirePersonalName = e.REQUIRE_PERSONAL_NAME;

    return {
        classifier,
        minStorageConfidence: e.MIN_STORAGE_CONFIDENCE,
        faceVerifyTimeoutMs: e.FACE_VERIFY_TIMEOUT_MS,
        faceVerifyConcurrency: e.FACE_VERIFY_CONCURRENCY,
        speakerProfilePath: e.SPEAKER_PROFILE_PATH,
    };
}
