import { describe, it, expect } from "vitest";
import { matchIdentity, IDENTITY_BOOST } from "../lib/identity";

const markers = {
    requiredNames: ["narcisse majila"],
    acceptableNames: ["pastor majila"],
    churchNames: ["ramah full gospel"],
};

describe("matchIdentity", () => {
    it("matches the speaker's full name as required tier", () => {
        const match = matchIdentity("live with narcisse majila tonight", markers);

        expect(match).toEqual({
            hasIdentity: true,
            boost: IDENTITY_BOOST.required,
            hasPersonalName: true,
            tier: "required",
            marker: "narcisse majila",
        });
    });

    it("matches a titled name as acceptable tier", () => {
        const match = matchIdentity("pastor majila on faith", markers);

        expect(match.tier).toBe("acceptable");
        expect(match.boost).toBe(0.25);
        expect(match.hasPersonalName).toBe(true);
    });

    it("treats a church name as context only", () => {
        const match = matchIdentity("ramah full gospel choir", markers);

        expect(match.tier).toBe("church");
        expect(match.hasIdentity).toBe(false);
        expect(match.hasPersonalName).toBe(false);
        expect(match.boost).toBe(0.1);
    });

    it("counts a church name as identity when a personal name is not required", () => {
        const match = matchIdentity("ramah full gospel choir", markers, false);

        expect(match.hasIdentity).toBe(true);
        expect(match.hasPersonalName).toBe(false);
        expect(match.boost).toBe(0.15);
    });

    it("returns no identity when nothing matches", () => {
        expect(matchIdentity("weekly update", markers)).toEqual({
            hasIdentity: false,
            boost: 0,
            hasPersonalName: false,
            tier: null,
        });
    });
});
