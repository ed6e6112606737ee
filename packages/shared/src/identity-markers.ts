import type { IdentityMarkers, SpeakerProfile } from "./types";

// Titles a speaker is announced with, English and French (with and without accents)
const SPEAKER_TITLES = [
    "apostle", "apotre", "apôtre", "pastor", "pasteur",
    "bishop", "prophet", "evangelist", "reverend", "dr.",
];

const SPEAKER_DESCRIPTORS = ["man of god", "servant of god", "serviteur de dieu", "homme de dieu"];

const ACRONYM_STOP_WORDS = new Set(["of", "the", "and"]);

/**
 * Generate identity markers for classification from a speaker profile.
 *
 * Required names are the full name, the last name and every alias. Acceptable
 * names pair each title or descriptor with the name. Church names only ever
 * give context; they are never proof of identity on their own.
 */
export function generateIdentityMarkers(profile: SpeakerProfile): IdentityMarkers {
    const fullName = profile.name.trim().toLowerCase();
    const parts = fullName.split(/\s+/);
    const lastName = parts.length > 1 ? parts[parts.length - 1] : fullName;
    const firstName = parts.length > 1 ? parts[0] : fullName;

    const requiredNames = unique([fullName, lastName, ...profile.aliases.map(a => a.trim().toLowerCase())]);

    const titles = profile.title
        ? unique([profile.title.trim().toLowerCase(), ...SPEAKER_TITLES])
        : SPEAKER_TITLES;

    const acceptableNames: string[] = [];
    for (const t of titles) {
        acceptableNames.push(`${t} ${fullName}`, `${t} ${lastName}`, `${t} ${firstName}`);
    }
    for (const d of SPEAKER_DESCRIPTORS) {
        acceptableNames.push(`${d} ${fullName}`, `${d} ${lastName}`);
    }

    const churchNames: string[] = [];
    if (profile.primaryChurch) {
        const church = profile.primaryChurch.trim().toLowerCase();
        churchNames.push(church);
        const words = church.split(/\s+/);
        if (words.length > 2) {
            churchNames.push(words.filter(w => !ACRONYM_STOP_WORDS.has(w)).map(w => w[0]).join(""));
        }
    }

    return {
        requiredNames,
        acceptableNames: unique(acceptableNames),
        churchNames: unique(churchNames),
    };
}

function unique(values: string[]): string[] {
    return [...new Set(values.filter(v => v.length > 0))];
}
