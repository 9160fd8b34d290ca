import assert from "node:assert/strict";
import test from "node:test";
import { clampPlaybackFraction, formatPlaybackTime } from "../../lib/format.ts";

test("formats seconds as m:ss", () => {
    assert.equal(formatPlaybackTime(0), "0:00");
    assert.equal(formatPlaybackTime(5.9), "0:05");
    assert.equal(formatPlaybackTime(75), "1:15");
    assert.equal(formatPlaybackTime(3725), "62:05");
});

test("non-finite and negative times format as 0:00", () => {
    assert.equal(formatPlaybackTime(Number.NaN), "0:00");
    assert.equal(formatPlaybackTime(Number.POSITIVE_INFINITY), "0:00");
    assert.equal(formatPlaybackTime(-4), "0:00");
});

test("clamps seek fractions to [0, 1]", () => {
    assert.equal(clampPlaybackFraction(-0.5), 0);
    assert.equal(clampPlaybackFraction(0.25), 0.25);
    assert.equal(clampPlaybackFraction(2), 1);
    assert.equal(clampPlaybackFraction(Number.NaN), 0);
});
