#!/usr/bin/env node
import * as core from '@actions/core';
import { main } from './main';

main(process.argv.slice(2))
    .then(code => {
        process.exitCode = code;
    })
    .catch(error => {
        core.setFailed(error instanceof Error ? error.message : String(error));
    });
