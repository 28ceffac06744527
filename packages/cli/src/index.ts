#!/usr/bin/env node
import { createRequire } from 'node:module';
import { z } from 'zod';
import { loadEnvironment } from './env.js';
import { runCli } from './program.js';

// Use createRequire to read package.json without the JSON import assertion
const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require('@corral/cli/package.json'));

process.exitCode = await runCli(
    process.argv.slice(2),
    {
        stdin: process.stdin,
        stdout: process.stdout,
        stderr: process.stderr,
        env: loadEnvironment(process.cwd()),
        cwd: process.cwd(),
    },
    pkg.version
);
