#!/usr/bin/env node

import { runCli } from './cliCommands.js';

async function main() {
	process.on('unhandledRejection', (err) => {
		// eslint-disable-next-line no-console
		console.error('[enginebind] unhandledRejection', err);
	});

	const code = await runCli(process.argv.slice(2), {
		log: (line) => console.log(line),
		error: (line) => console.error(line),
		cwd: process.cwd(),
	});
	process.exit(code);
}

main().catch((err: unknown) => {
	// eslint-disable-next-line no-console
	console.error('[enginebind] failed', err instanceof Error ? err.message : String(err));
	process.exit(1);
});
