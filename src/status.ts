#!/usr/bin/env node
/**
 * Status script - serve run state for an output folder over HTTP
 * Run: npm run status -- <inputFolder> [--output <dir>] [--port <n>]
 */

import { runStatusCli } from './cli';

async function main() {
    const server = await runStatusCli(process.argv.slice(2));
    if (typeof server === 'number') {
        process.exitCode = server;
        return;
    }

    const shutdown = () => {
        console.log('\n🛑 Shutting down...');
        server.close(() => process.exit(0));
    };
    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);
}

main().catch((err) => {
    console.error('💥 Fatal error:', err);
    process.exit(1);
});
