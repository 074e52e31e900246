#!/usr/bin/env tsx
import { main } from './cli.js'

process.exitCode = await main()
