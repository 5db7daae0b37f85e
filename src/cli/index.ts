#!/usr/bin/env node
import { ColorweaveError } from '../utils/errors'
import { createDefaultContext } from './context'
import { buildProgram } from './program'

buildProgram(createDefaultContext())
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    if (err instanceof ColorweaveError) {
      console.error(`error: ${err.message}`)
    } else {
      console.error('error:', err instanceof Error ? err.message : err)
    }
    process.exitCode = 1
  })
