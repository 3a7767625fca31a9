#!/usr/bin/env node

import { runCli } from "./program"

runCli(process.argv.slice(2))
    .then((exitCode) => {
        process.exitCode = exitCode
    })
    .catch((error: unknown) => {
        console.error(error)
        process.exitCode = 1
    })
