import { Command } from '@effect/cli'
import { Layer } from 'effect'
import { calcCommand } from './commands/calc.js'
import { compareCommand } from './commands/compare.js'
import { convertCommand } from './commands/convert.js'
import { parseCommand } from './commands/parse.js'
import { error } from './lib/output.js'
import { CliConfigService } from './services/config.js'

// Root command
const rootCommand = Command.make('bytewise').pipe(
  Command.withDescription('bytewise - parse, convert and compute with byte quantities'),
  Command.withSubcommands([parseCommand, convertCommand, calcCommand, compareCommand]),
)

// Handlers report their own failures; configuration is read before they run
const servicesLayer = CliConfigService.layer.pipe(
  Layer.tapError((e) => error(`Invalid configuration: ${String(e)}`)),
)

// Provide services to commands
const commandWithServices = rootCommand.pipe(Command.provide(servicesLayer))

// Export the CLI runner
export const cli = Command.run(commandWithServices, {
  name: 'bytewise',
  version: '0.1.0',
})
