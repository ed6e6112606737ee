import type { IdentityMarkers } from "@sermon-sieve/shared";

export interface IdentityMatch {
    hasIdentity: boolean;
    boost: number;
    /** True only when the speaker's own name matched, never for a church name alone. */
    hasPersonalName: boolean;
    tier: "required" | "acceptable" | "church" | null;
    marker?: string;
}

export const IDENTITY_BOOST = {
    required: 0.30,
    acceptable: 0.25,
    church: 0.10,
    legacyChurch: 0.15,
} as const;

/**
 * Scan lower-cased text for the target speaker's identity markers.
 * Tiers are checked in order and the first hit wins.
 */
export function matchIdentity(
    text: string,
    markers: IdentityMarkers,
    requirePersonalName = true
): IdentityMatch {
    const required = markers.requiredNames.find(name => text.includes(name));
    if (required) {
        return { hasIdentity: true, boost: IDENTITY_BOOST.required, hasPersonalName: true, tier: "required", marker: required };
    }

    const acceptable = markers.acceptableNames.find(name => text.includes(name));
    if (acceptable) {
        return { hasIdentity: true, boost: IDENTITY_BOOST.acceptable, hasPersonalName: true, tier: "acceptable", marker: acceptable };
    }

    // Church channels post many speakers: a church name is context, not identity
    const church = markers.churchNames.find(name => text.includes(name));
    if (church) {
        return requirePersonalName
            ? { hasIdentity: false, boost: IDENTITY_BOOST.church, hasPersonalName: false, tier: "church", marker: church }
            : { hasIdentity: true, boost: IDENTITY_BOOST.legacyChurch, hasPersonalName: false, tier: "church", marker: church };
    }

    return { hasIdentity: false, boost: 0, hasPersonalName: false, tier: null };
}
