#!/usr/bin/env node
import { runCommand } from './commands.js';
import { Dispatcher } from './core/Dispatcher.js';

async function main() {
    const dispatcher = Dispatcher.fromEnv();
    process.exitCode = await runCommand(process.argv.slice(2), dispatcher, {
        log: (message) => console.log(message),
        error: (message) => console.error(message),
        write: (chunk) => process.stdout.write(chunk),
    });
}

main().catch((error: unknown) => {
    console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
    process.exitCode = 1;
});
