#!/usr/bin/env node

/* eslint-disable no-console */

import { config as loadDotenv } from 'dotenv'
import { runCli } from '../src/cli/cli'

// JOULEBENCH_* settings may come from a .env file in the working directory
loadDotenv()

runCli().catch((error: unknown) => {
  console.error('joulebench failed:', error instanceof Error ? error.message : error)
  process.exitCode = 1
})
