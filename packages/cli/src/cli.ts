#!/usr/bin/env node
/**
 * @archconf/cli - Generate archive engine configuration from database files
 */

import { main } from './program.js';

process.exitCode = await main(process.argv.slice(2));
