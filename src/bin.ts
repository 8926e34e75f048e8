#!/usr/bin/env node
import { config as loadDotenv } from 'dotenv';
import { processIo, run } from './cli.js';

loadDotenv();

process.exitCode = await run(process.argv.slice(2), processIo());
