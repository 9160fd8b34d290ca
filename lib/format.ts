/** Formats seconds as `m:ss`, the transport clock shown next to the scrubber. */
export function formatPlaybackTime(seconds: number): string {
    if (!Number.isFinite(seconds) || seconds <= 0) {
        return "0:00";
    }

    const whole = Math.floor(seconds);
    const minutes = Math.floor(whole / 60);
    const remainder = whole % 60;
    return `${minutes}:${remainder.toString().padStart(2, "0")}`;
}

export function clampPlaybackFraction(value: number): number {
    if (!Number.isFinite(value)) return 0;
    return Math.max(0, Math.min(1, value));
}
