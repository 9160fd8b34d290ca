import assert from "node:assert/strict";
import test from "node:test";
import { PlaybackStateMachine } from "../../lib/audio/playback-state-machine.ts";
import { createLogger } from "../../lib/logger.ts";

const createMachine = () =>
    new PlaybackStateMachine(createLogger("test", { level: "silent" }));

test("follows the resolve-and-play path", () => {
    const machine = createMachine();

    assert.equal(machine.transition("RESOLVING"), true);
    assert.equal(machine.transition("STARTING"), true);
    assert.equal(machine.transition("PLAYING"), true);
    assert.equal(machine.getPhase(), "PLAYING");
    assert.equal(machine.getContext().previousPhase, "STARTING");
});

test("rejects transitions that are not listed", () => {
    const machine = createMachine();

    assert.equal(machine.transition("PAUSED"), false);
    assert.equal(machine.getPhase(), "IDLE");
    assert.equal(machine.canTransition("COMPLETED"), false);
});

test("forceTransition bypasses validation", () => {
    const machine = createMachine();
    machine.forceTransition("COMPLETED");

    assert.equal(machine.getPhase(), "COMPLETED");
    assert.equal(machine.getContext().previousPhase, "IDLE");
});

test("a transition to the current phase keeps the previous phase", () => {
    const machine = createMachine();
    machine.transition("RESOLVING");
    machine.transition("RESOLVING");

    assert.equal(machine.getPhase(), "RESOLVING");
    assert.equal(machine.getContext().previousPhase, "IDLE");
});
