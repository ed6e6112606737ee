import type { Language, Lexicon } from "@sermon-sieve/shared";

const WORD_PATTERN = /[\p{L}\p{N}_]+/gu;

// The winning language needs more than this many extra indicator words
const MAJORITY_MARGIN = 2;

export function detectLanguage(
    text: string,
    lexicon: Pick<Lexicon, "frenchWords" | "englishWords" | "frenchCues" | "englishCues">
): Language {
    const lower = text.toLowerCase();
    const words = new Set(lower.match(WORD_PATTERN) ?? []);

    const frenchCount = lexicon.frenchWords.filter(w => words.has(w)).length;
    const englishCount = lexicon.englishWords.filter(w => words.has(w)).length;

    if (frenchCount > englishCount + MAJORITY_MARGIN) return "FRENCH";
    if (englishCount > frenchCount + MAJORITY_MARGIN) return "ENGLISH";

    // No clear majority: fall back to single strong cues
    if (lexicon.frenchCues.some(cue => lower.includes(cue))) return "FRENCH";
    if (lexicon.englishCues.some(cue => lower.includes(cue))) return "ENGLISH";

    return "UNKNOWN";
}
