#!/usr/bin/env node
// ss2v2ray/src/cli.ts — process wrapper around main()

import main from './index.js';

try {
    process.exitCode = main(process.argv.slice(2));
} catch (error) {
    console.error(error);
    process.exitCode = 1;
}
