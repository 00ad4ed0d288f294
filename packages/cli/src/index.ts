#!/usr/bin/env -S node --import tsx

import 'dotenv/config'
import { createProgram } from './program.js'

await createProgram().parseAsync()
