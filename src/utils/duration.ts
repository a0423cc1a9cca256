/**
 * Helpers for catalog duration strings ("4:05", "1:02:03") and the
 * seconds-based values the playback engine counts down.
 */

export const MIN_DURATION_SECONDS = 1;

const DURATION_PART = /^\d+$/;

/**
 * Parses `M:SS` or `H:MM:SS`. Returns null for anything else, including
 * single values ("245"), four-part strings and negative or non-numeric parts.
 * The result is not clamped.
 */
export function parseDurationString(value: string): number | null {
    const parts = value.trim().split(":");
    if (parts.length !== 2 && parts.length !== 3) {
        return null;
    }
    if (!parts.every((part) => DURATION_PART.test(part))) {
        return null;
    }

    return parts
        .map((part) => Number.parseInt(part, 10))
        .reverse()
        .reduce((total, part, i) => total + part * 60 ** i, 0);
}

export function clampDurationSeconds(seconds: number): number {
    return Math.max(Math.floor(seconds), MIN_DURATION_SECONDS);
}

/** `minutes:SS`, minutes unbounded (75 minutes → "75:00"). */
export function formatMinutesSeconds(totalSeconds: number): string {
    const whole = Math.max(Math.floor(totalSeconds), 0);
    const minutes = Math.floor(whole / 60);
    const seconds = whole % 60;
    return `${minutes}:${String(seconds).padStart(2, "0")}`;
}
