import type { ChannelTrustLevel, ChannelTrustTiers } from "@sermon-sieve/shared";

/**
 * 3 = verified (only the target speaker's content, auto-accept)
 * 2 = trusted  (known church channel)
 * 1 = known    (churches where the speaker has preached among others)
 * 0 = unknown
 */
export function resolveChannelTrust(
    channelName: string | null | undefined,
    tiers: ChannelTrustTiers
): ChannelTrustLevel {
    if (channelMatchesAny(channelName, tiers.verified)) return 3;
    if (channelMatchesAny(channelName, tiers.trusted)) return 2;
    if (channelMatchesAny(channelName, tiers.known)) return 1;
    return 0;
}

/**
 * Strict channels also post other speakers, so a PREACHING verdict from them
 * needs a verified face.
 */
export function isStrictChannel(channelName: string | null | undefined, strictChannels: readonly string[]): boolean {
    return channelMatchesAny(channelName, strictChannels);
}

// Case-insensitive substring match in either direction ("@Handle" vs "Handle Church")
function channelMatchesAny(channelName: string | null | undefined, candidates: readonly string[]): boolean {
    const channel = channelName?.trim().toLowerCase();
    if (!channel) return false;

    return candidates.some(candidate => {
        const c = candidate.toLowerCase();
        return c.length > 0 && (channel.includes(c) || c.includes(channel));
    });
}
