#!/usr/bin/env node
import 'dotenv/config';
/**
 * govern CLI
 *
 * Config validation, isolation gate checks, pool builds, constraint
 * resolution, falsifier runs and audit queries.
 */

import { runCli } from './program.js';

process.exitCode = await runCli(process.argv.slice(2));
