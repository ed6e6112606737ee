import { describe, it, expect } from "vitest";
import { generateIdentityMarkers } from "../identity-markers";

describe("generateIdentityMarkers", () => {
    it("derives required names from the name and aliases", () => {
        const markers = generateIdentityMarkers({ name: "Grace Mbeki", aliases: ["Mama Grace"] });

        expect(markers.requiredNames).toEqual(["grace mbeki", "mbeki", "mama grace"]);
        expect(markers.churchNames).toEqual([]);
    });

    it("pairs titles and descriptors with the name", () => {
        const markers = generateIdentityMarkers({ name: "Grace Mbeki", title: "Mother", aliases: [] });

        expect(markers.acceptableNames).toContain("mother grace mbeki");
        expect(markers.acceptableNames).toContain("apostle mbeki");
        expect(markers.acceptableNames).toContain("pasteur grace");
        expect(markers.acceptableNames).toContain("servant of god mbeki");
        expect(markers.acceptableNames).not.toContain("servant of god grace");
    });

    it("adds an acronym for long church names", () => {
        expect(generateIdentityMarkers({ name: "Grace Mbeki", aliases: [], primaryChurch: "House of Prayer Ministries" }).churchNames)
            .toEqual(["house of prayer ministries", "hpm"]);
        expect(generateIdentityMarkers({ name: "Grace Mbeki", aliases: [], primaryChurch: "Grace Chapel" }).churchNames)
            .toEqual(["grace chapel"]);
    });

    it("handles a single-word name", () => {
        const markers = generateIdentityMarkers({ name: "Mbeki", aliases: [] });

        expect(markers.requiredNames).toEqual(["mbeki"]);
        expect(markers.acceptableNames).toContain("pastor mbeki");
    });
});
