#!/usr/bin/env node
import {program} from './utils/program.ts'

process.exitCode = await program(process.argv.slice(2))
