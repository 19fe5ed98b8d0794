#!/usr/bin/env node

import { main } from '../cli';
import { EXIT_CODES } from '../constants';

main(process.argv.slice(2))
    .then(code => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        // eslint-disable-next-line no-console
        console.error(error);
        process.exitCode = EXIT_CODES.UNEXPECTED_FAILURE;
    });
