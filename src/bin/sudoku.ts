#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { run } from '../cli/sudoku.cli';

process.exitCode = run(process.argv.slice(2), readFileSync(0, 'utf8'));
