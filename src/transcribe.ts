#!/usr/bin/env node
/**
 * Transcribe script - batch speech-to-text over a folder of session recordings
 * Run: npm run transcribe -- <inputFolder> [--force] [--post-process-only] [--cleanup]
 *
 * Transcribes new audio files, normalizes each transcript, then writes the
 * merged and per-speaker transcripts. Safe to re-run after an interruption.
 */

import { runTranscribeCli } from './cli';

async function main() {
    console.log('🎙️ Session Transcriber - batch speech-to-text\n');
    process.exitCode = await runTranscribeCli(process.argv.slice(2));
}

main().catch((err) => {
    console.error('💥 Fatal error:', err);
    process.exit(1);
});
