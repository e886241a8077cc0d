#!/usr/bin/env -S node --import tsx
import { NodeContext, NodeRuntime } from '@effect/platform-node'
import { Effect } from 'effect'

import { cli } from './cli.js'

const program = cli(process.argv).pipe(Effect.provide(NodeContext.layer))

// Command handlers print their own failures
NodeRuntime.runMain(program, { disableErrorReporting: true })
