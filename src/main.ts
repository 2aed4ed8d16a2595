#!/usr/bin/env node
import 'dotenv/config';
import { handleHelpCli, runWatchCli } from './core/cli.js';

const argv = process.argv.slice(2);

if (!handleHelpCli(argv)) {
    process.exitCode = await runWatchCli(argv);
}
