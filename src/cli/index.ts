#!/usr/bin/env node

import {errorMessage} from "../errors.js"
import {createProgram} from "./program.js"

createProgram().parseAsync(process.argv).catch(err => {
    console.error(errorMessage(err))
    process.exit(1)
})
