import { readFile } from "fs/promises";
import { SpeakerProfileSchema, TargetProfileDataSchema } from "@sermon-sieve/shared";
import type { ClassifierConfigOverrides } from "./config.js";
import { ConfigError, InvalidInputError, formatZodIssues } from "./errors.js";

export async function readJsonFile(path: string): Promise<unknown> {
    const raw = await readFile(path, "utf8");
    try {
        return JSON.parse(raw);
    } catch (error) {
        throw new InvalidInputError(`${path} is not valid JSON`, [error instanceof Error ? error.message : String(error)]);
    }
}

/**
 * Load a target profile file. Two shapes are accepted:
 *  - a speaker ({ name, title?, aliases?, primaryChurch? }), from which
 *    identity markers are generated;
 *  - explicit marker and channel lists ({ requiredNames, channelTrustTiers, ... }).
 */
export async function loadProfileOverrides(path: string): Promise<ClassifierConfigOverrides> {
    const data = await readJsonFile(path);

    if (data && typeof data === "object" && "name" in data) {
        const speaker = SpeakerProfileSchema.safeParse(data);
        if (!speaker.success) {
            throw new ConfigError(`Invalid speaker profile in ${path}`, formatZodIssues(speaker.error));
        }
        return { profile: speaker.data };
    }

    const markers = TargetProfileDataSchema.partial().safeParse(data);
    if (!markers.success) {
        throw new ConfigError(`Invalid target profile in ${path}`, formatZodIssues(markers.error));
    }
    return markers.data;
}
