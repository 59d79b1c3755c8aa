#!/usr/bin/env node
import { processIO, run } from './cli.js';

process.exitCode = run(process.argv.slice(2), processIO());
