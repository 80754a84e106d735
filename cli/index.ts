/**
 * Command Line: Entry Point
 *
 * Usage: npm run observe -- -u e KCASANFR1234
 */
/* eslint-disable no-console */

import { runCli } from './cli';

runCli(process.argv.slice(2), {
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text)
})
    .then((code) => {
        process.exitCode = code;
    })
    .catch((error) => {
        console.error(error);
        process.exitCode = 1;
    });
