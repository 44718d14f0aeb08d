#!/usr/bin/env tsx
import process from 'node:process'
import { runCli } from './cli.js'

process.exitCode = await runCli(process.argv.slice(2))
