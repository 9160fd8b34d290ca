import assert from "node:assert/strict";
import test from "node:test";
import type { HowlOptions } from "howler";
import {
    createPlayerAdapterFactory,
    resolvePlayerBackendKind,
} from "../../lib/audio-engine/index.ts";
import {
    HowlerPlayerAdapter,
    createLocalFilePlayerAdapter,
    createStreamPlayerAdapter,
    inferFormatFromUrl,
    resolveFormat,
    type HowlLike,
} from "../../lib/audio-engine/howlerPlayerAdapter.ts";
import { ErrorCode, PlaybackError } from "../../lib/errors.ts";

class FakeHowl implements HowlLike {
    readonly calls: string[] = [];
    position: unknown = 0;
    length = 0;
    loadState: "unloaded" | "loading" | "loaded" = "loaded";
    private readonly endHandlers = new Set<() => void>();

    play(): number {
        this.calls.push("play");
        return 1;
    }

    pause(): this {
        this.calls.push("pause");
        return this;
    }

    stop(): this {
        this.calls.push("stop");
        return this;
    }

    seek(position?: number): unknown {
        if (position === undefined) {
            if (this.loadState !== "loaded") {
                throw new TypeError("Cannot read properties of undefined (reading 'currentTime')");
            }
            return this.position;
        }
        this.calls.push(`seek:${position}`);
        this.position = position;
        return this;
    }

    duration(): number {
        return this.length;
    }

    state(): "unloaded" | "loading" | "loaded" {
        return this.loadState;
    }

    rate(rate: number): this {
        this.calls.push(`rate:${rate}`);
        return this;
    }

    on(_event: "end", callback: () => void): this {
        this.endHandlers.add(callback);
        return this;
    }

    off(_event: "end", callback: () => void): this {
        this.endHandlers.delete(callback);
        return this;
    }

    unload(): void {
        this.calls.push("unload");
    }

    get endHandlerCount(): number {
        return this.endHandlers.size;
    }

    emitEnd(): void {
        [...this.endHandlers].forEach((handler) => handler());
    }
}

function captureHowl() {
    const howl = new FakeHowl();
    const created: HowlOptions[] = [];
    const createHowl = (options: HowlOptions): HowlLike => {
        created.push(options);
        return howl;
    };
    return { howl, created, createHowl };
}

test("formats come from the explicit format, the MIME type, then the extension", () => {
    assert.equal(resolveFormat({ location: "https://cdn.test/a", format: " OGG " }), "ogg");
    assert.equal(
        resolveFormat({ location: "https://cdn.test/a", mimeType: "audio/mpeg" }),
        "mp3"
    );
    assert.equal(inferFormatFromUrl("https://cdn.test/book.m4a?token=x"), "mp4");
    assert.equal(inferFormatFromUrl("https://radio.test/live"), undefined);
});

test("remote locations use the stream backend", () => {
    assert.equal(resolvePlayerBackendKind({ location: "https://cdn.test/a.mp3" }), "stream");
    assert.equal(resolvePlayerBackendKind({ location: "HTTP://cdn.test/a.mp3" }), "stream");
    assert.equal(resolvePlayerBackendKind({ location: "/books/a.mp3" }), "local-file");
    assert.equal(resolvePlayerBackendKind({ location: "file:///books/a.mp3" }), "local-file");
});

test("stream adapters configure HTML5 audio", () => {
    const { created, createHowl } = captureHowl();

    const adapter = createStreamPlayerAdapter(
        { location: " https://cdn.test/a.mp3 " },
        { createHowl }
    );

    assert.equal(adapter.kind, "stream");
    assert.equal(created.length, 1);
    assert.deepEqual(created[0].src, ["https://cdn.test/a.mp3"]);
    assert.equal(created[0].html5, true);
    assert.equal(created[0].autoplay, false);
    assert.deepEqual(created[0].format, ["mp3"]);
});

test("stream adapters require a location", () => {
    const { createHowl } = captureHowl();
    assert.throws(
        () => createStreamPlayerAdapter({ location: "  " }, { createHowl }),
        /non-empty source URL/
    );
});

test("local-file adapters load existing files through a file URL", () => {
    const { created, createHowl } = captureHowl();
    const checked: string[] = [];

    const adapter = createLocalFilePlayerAdapter(
        { location: "file:///books/a.m4a" },
        {
            createHowl,
            fileExists: (path) => {
                checked.push(path);
                return true;
            },
        }
    );

    assert.equal(adapter.kind, "local-file");
    assert.deepEqual(checked, ["/books/a.m4a"]);
    assert.deepEqual(created[0].src, ["file:///books/a.m4a"]);
    assert.equal(created[0].html5, false);
    assert.deepEqual(created[0].format, ["mp4"]);
});

test("a missing local file raises FILE_NOT_FOUND", () => {
    const { created, createHowl } = captureHowl();

    assert.throws(
        () =>
            createLocalFilePlayerAdapter(
                { location: "/books/missing.mp3" },
                { createHowl, fileExists: () => false }
            ),
        (error: unknown) =>
            error instanceof PlaybackError &&
            error.code === ErrorCode.FILE_NOT_FOUND &&
            error.message === "File not found: /books/missing.mp3"
    );
    assert.equal(created.length, 0);
});

test("the factory dispatches on the location", () => {
    const { created, createHowl } = captureHowl();
    const factory = createPlayerAdapterFactory({ createHowl, fileExists: () => true });

    assert.equal(factory({ location: "https://radio.test/live" }).kind, "stream");
    assert.equal(factory({ location: "/books/a.mp3" }).kind, "local-file");
    assert.equal(created.length, 2);
});

test("transport calls reach the Howl", () => {
    const howl = new FakeHowl();
    const adapter = new HowlerPlayerAdapter("stream", howl);

    adapter.play();
    adapter.setRate(1.5);
    adapter.seek(-3);
    adapter.pause();

    assert.deepEqual(howl.calls, ["play", "rate:1.5", "seek:0", "pause"]);
});

test("time and duration read as 0 until known", () => {
    const howl = new FakeHowl();
    const adapter = new HowlerPlayerAdapter("stream", howl);

    howl.position = howl;
    howl.length = Number.NaN;
    assert.equal(adapter.getCurrentTime(), 0);
    assert.equal(adapter.getDuration(), 0);

    howl.position = 12.5;
    howl.length = 300;
    assert.equal(adapter.getCurrentTime(), 12.5);
    assert.equal(adapter.getDuration(), 300);
});

test("time and duration are not read before the source has loaded", () => {
    const howl = new FakeHowl();
    const adapter = new HowlerPlayerAdapter("stream", howl);
    howl.loadState = "loading";
    howl.length = 300;

    assert.equal(adapter.getCurrentTime(), 0);
    assert.equal(adapter.getDuration(), 0);

    howl.loadState = "loaded";
    howl.position = 4;
    assert.equal(adapter.getCurrentTime(), 4);
    assert.equal(adapter.getDuration(), 300);
});

test("load and play errors reach error observers until removed", () => {
    const { created, createHowl } = captureHowl();
    const adapter = createStreamPlayerAdapter(
        { location: "https://cdn.test/a.mp3" },
        { createHowl }
    );
    const errors: PlaybackError[] = [];
    const observer = adapter.onError((error) => {
        errors.push(error);
    });

    created[0].onloaderror?.(1, "No codec support for selected audio sources.");
    created[0].onplayerror?.(1, "Playback was unable to start.");
    observer.remove();
    created[0].onloaderror?.(1, "again");

    assert.deepEqual(
        errors.map((error) => [error.code, error.message]),
        [
            [ErrorCode.PLAYBACK_FAILED, "Load error for https://cdn.test/a.mp3"],
            [ErrorCode.PLAYBACK_FAILED, "Play error for https://cdn.test/a.mp3"],
        ]
    );
});

test("a released adapter reports no errors", () => {
    const { created, createHowl } = captureHowl();
    const adapter = createLocalFilePlayerAdapter(
        { location: "/books/a.mp3" },
        { createHowl, fileExists: () => true }
    );
    let reported = 0;
    adapter.onError(() => {
        reported += 1;
    });

    adapter.release();
    created[0].onloaderror?.(1, "Decoding audio data failed.");

    assert.equal(reported, 0);
});

test("completion observers fire on end and can be removed", () => {
    const howl = new FakeHowl();
    const adapter = new HowlerPlayerAdapter("stream", howl);
    let completions = 0;

    const observer = adapter.onCompletion(() => {
        completions += 1;
    });
    howl.emitEnd();
    observer.remove();
    observer.remove();
    howl.emitEnd();

    assert.equal(completions, 1);
    assert.equal(howl.endHandlerCount, 0);
});

test("release unloads once and silences later calls", () => {
    const howl = new FakeHowl();
    const adapter = new HowlerPlayerAdapter("stream", howl);
    adapter.onCompletion(() => undefined);

    adapter.release();
    adapter.release();
    adapter.play();
    howl.position = 40;

    assert.equal(adapter.isReleased(), true);
    assert.equal(howl.endHandlerCount, 0);
    assert.deepEqual(howl.calls, ["stop", "unload"]);
    assert.equal(adapter.getCurrentTime(), 0);
});
