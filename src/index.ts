#!/usr/bin/env node
import { runCli } from './cli';
import { describeError } from './Errors';

// If you want to change feeds or the interval it is recommended to do so in the ./config.json file
runCli(process.argv.slice(2))
    .then((exitCode) => {
        process.exitCode = exitCode;
    })
    .catch((error: unknown) => {
        console.error(`fatal: ${describeError(error)}`);
        process.exitCode = 1;
    });
