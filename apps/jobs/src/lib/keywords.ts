import type { VideoRecord, Lexicon } from "@sermon-sieve/shared";

/**
 * Combine title and description into the lower-cased text every matcher scans.
 */
export function searchableText(video: Pick<VideoRecord, "title" | "description">): string {
    const parts: string[] = [];
    if (video.title) parts.push(video.title);
    if (video.description) parts.push(video.description);
    return parts.join(" ").toLowerCase();
}

/**
 * Count matched preaching keywords. Strong terms ("sermon", "predication", ...)
 * count twice.
 */
export function countPreachingKeywords(
    text: string,
    lexicon: Pick<Lexicon, "preachingKeywords" | "strongPreachingKeywords">
): number {
    let count = 0;
    for (const keyword of lexicon.preachingKeywords) {
        if (!text.includes(keyword)) continue;
        count += lexicon.strongPreachingKeywords.includes(keyword) ? 2 : 1;
    }
    return count;
}

export function countMusicKeywords(text: string, lexicon: Pick<Lexicon, "musicKeywords">): number {
    return lexicon.musicKeywords.filter(k => text.includes(k)).length;
}

export function findStrongMusicIndicator(
    text: string,
    lexicon: Pick<Lexicon, "strongMusicIndicators">
): string | undefined {
    return lexicon.strongMusicIndicators.find(k => text.includes(k));
}
