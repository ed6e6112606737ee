import { describe, it, expect } from "vitest";
import { resolveChannelTrust, isStrictChannel } from "../lib/channel-trust";

const tiers = {
    verified: ["narcisse majila ministries"],
    trusted: ["@ramahfullgospelchurchpretoria"],
    known: ["eglise locale kinshasa"],
};

describe("resolveChannelTrust", () => {
    it("resolves each tier", () => {
        expect(resolveChannelTrust("Narcisse Majila Ministries", tiers)).toBe(3);
        expect(resolveChannelTrust("Eglise Locale Kinshasa", tiers)).toBe(1);
        expect(resolveChannelTrust("Another Channel", tiers)).toBe(0);
    });

    it("matches a handle against the bare channel name", () => {
        expect(resolveChannelTrust("RamahFullGospelChurchPretoria", tiers)).toBe(2);
    });

    it("matches a longer channel name containing a listed one", () => {
        expect(resolveChannelTrust("  Eglise Locale Kinshasa - Replays ", tiers)).toBe(1);
    });

    it("gives missing or blank names the lowest trust", () => {
        expect(resolveChannelTrust(undefined, tiers)).toBe(0);
        expect(resolveChannelTrust(null, tiers)).toBe(0);
        expect(resolveChannelTrust("   ", tiers)).toBe(0);
    });
});

describe("isStrictChannel", () => {
    it("matches case-insensitively", () => {
        expect(isStrictChannel("RAMAH FULL GOSPEL CHURCH PRETORIA", ["ramah full gospel church pretoria"])).toBe(true);
        expect(isStrictChannel("Eglise Locale Kinshasa", ["ramah full gospel church pretoria"])).toBe(false);
        expect(isStrictChannel(undefined, ["ramah full gospel church pretoria"])).toBe(false);
    });
});
