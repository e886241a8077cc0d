import { Options } from '@effect/cli'

export const formatOption = Options.choice('format', ['table', 'json']).pipe(
  Options.withAlias('f'),
  Options.withDefault('table' as const),
  Options.withDescription('Output format (table for humans, json for scripts)'),
)

/** A standard name; when absent the BYTEWISE_STANDARD default applies */
export const standardOption = (name: string, description: string) =>
  Options.text(name).pipe(Options.optional, Options.withDescription(description))
