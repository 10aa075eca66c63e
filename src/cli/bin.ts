#!/usr/bin/env -S npx tsx
import { createCli } from './index';

createCli()
    .execute()
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error(error);
        process.exitCode = 1;
    });
