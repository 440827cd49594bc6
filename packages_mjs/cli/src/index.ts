#!/usr/bin/env node
import { createProgram } from './program.js';
import { getLogger } from './logger.js';

const logger = getLogger();

createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
        logger.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    });
