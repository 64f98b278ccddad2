#!/usr/bin/env node
import { load_config } from '../server/config';
import { start_server } from '../server/sudoku.server';

const server = start_server(load_config());

process.on('SIGINT', () => {
    server.close(() => process.exit(0));
});
