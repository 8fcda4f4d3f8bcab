import * as path from 'path';

// e.g. "12-alice_7.mp3": session number, player, chunk number
const SPEAKER_FILENAME = /^\d+-([^_]+)_\d+/;

/**
 * Speaker label for an audio or transcript filename (without directory).
 * Falls back to the name without its extension.
 */
export function extractSpeaker(fileName: string): string {
    const match = fileName.match(SPEAKER_FILENAME);
    if (match) {
        return match[1];
    }
    const stripped = path.parse(fileName).name;
    return stripped || fileName;
}
