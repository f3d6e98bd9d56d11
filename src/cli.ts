#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig } from './lib/config.js';
import { runCli } from './lib/runCli.js';

process.exitCode = runCli(process.argv.slice(2), console, loadConfig(process.env));
