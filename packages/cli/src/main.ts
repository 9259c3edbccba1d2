#!/usr/bin/env node

import { run } from './index';

const result = await run(process.argv.slice(2), { color: process.stdout.isTTY === true });
process.stdout.write(result.stdout);
process.stderr.write(result.stderr);
process.exitCode = result.exitCode;
