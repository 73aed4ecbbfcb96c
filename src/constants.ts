/**
 * Shared constants for rolecall
 */

// --- Rendering ---
export const PERSONA_PREFIX = 'You are ';

// Number of leading characters of a description persisted as its key
export const IDENTIFICATION_KEY_LENGTH = 20;

// --- Identification ---
// Skips a fixed-width speaker tag such as "system: " in a transcript line.
// Persisted roles depend on these offsets; do not change them.
export const FALLBACK_WINDOW_START = 8;
export const FALLBACK_WINDOW_END = 27;

// --- Storage ---
export const ROLE_FILE_EXTENSION = '.json';

export const UNKNOWN_ROLE = 'unknown';
