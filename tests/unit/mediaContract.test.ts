import assert from "node:assert/strict";
import test from "node:test";
import {
    filterAudioTracks,
    isAudioTrack,
    normalizeCatalogMediaType,
    resolveLibraryItemKind,
    toTrack,
} from "@shelfcast/media-contract";

test("media types normalize case and whitespace", () => {
    assert.equal(normalizeCatalogMediaType(" Audio "), "audio");
    assert.equal(normalizeCatalogMediaType("texts"), "texts");
    assert.equal(normalizeCatalogMediaType("collection"), null);
    assert.equal(normalizeCatalogMediaType(42), null);
});

test("library item kinds follow the media type", () => {
    assert.equal(resolveLibraryItemKind("texts"), "pdf");
    assert.equal(resolveLibraryItemKind("AUDIO"), "audiobook");
    assert.equal(resolveLibraryItemKind("movies"), "video");
    assert.equal(resolveLibraryItemKind("software"), "other");
    assert.equal(resolveLibraryItemKind(undefined), "other");
});

test("only audio tracks pass the filter, in order", () => {
    const tracks = [
        { id: "1", mediaType: "audio" },
        { id: "2", mediaType: "texts" },
        { id: "3", mediaType: "Audio" },
        { id: "4", mediaType: "" },
    ];

    assert.deepEqual(
        filterAudioTracks(tracks).map((track) => track.id),
        ["1", "3"]
    );
    assert.equal(isAudioTrack({ mediaType: "movies" }), false);
});

test("toTrack fills fallbacks and rejects items without an id", () => {
    assert.deepEqual(toTrack({ id: "item-1", mediatype: "audio" }), {
        id: "item-1",
        title: "item-1",
        mediaType: "audio",
        identifier: "item-1",
    });
    assert.deepEqual(
        toTrack({
            id: "t1",
            title: " Chapter One ",
            mediaType: "audio",
            identifier: "book-1",
        }),
        { id: "t1", title: "Chapter One", mediaType: "audio", identifier: "book-1" }
    );
    assert.equal(toTrack({ title: "No id" }), null);
    assert.equal(Object.isFrozen(toTrack({ id: "item-2" })), true);
});
