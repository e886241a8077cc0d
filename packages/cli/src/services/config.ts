import { StandardName } from '@bytewise/core'
import { Config, Context, Effect, Layer } from 'effect'

export interface CliConfig {
  readonly standard: StandardName
}

export class CliConfigService extends Context.Tag('@bytewise/cli/Config')<CliConfigService, CliConfig>() {
  static readonly layer = Layer.effect(
    CliConfigService,
    Effect.gen(function* () {
      const standard = yield* Config.literal(...StandardName.literals)('BYTEWISE_STANDARD').pipe(
        Config.withDefault('binary'),
      )
      return { standard }
    }),
  )
}
