import lexiconData from "./data/lexicon.json";
import profileData from "./data/profile.json";
import { LexiconSchema, TargetProfileDataSchema } from "./schemas";
import type { Lexicon, TargetProfileData, DurationThresholds } from "./types";

// Curated word lists (preaching, music, language cues)
export const DEFAULT_LEXICON: Lexicon = LexiconSchema.parse(lexiconData);

// Identity markers and channel lists for the default target speaker
export const DEFAULT_TARGET_PROFILE: TargetProfileData = TargetProfileDataSchema.parse(profileData);

// Seconds
export const DEFAULT_DURATION_THRESHOLDS: DurationThresholds = {
    shortClip: 240,     // 4 minutes - very short, likely music/clip
    maxMusic: 600,      // 10 minutes - if no preaching keywords, likely music
    minSermon: 1800,    // 30 minutes
    likelySermon: 2700, // 45 minutes
};
