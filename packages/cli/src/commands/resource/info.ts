import type { CommandContext, CommandOptions, SingleOutput } from '../../output/index.js'
import { parseFieldList } from './options.js'

export async function runInfoCommand(
  kind: string,
  id: string,
  context: CommandContext,
  options: CommandOptions
): Promise<SingleOutput> {
  const client = await context.connect()
  const result = await client.detailQuery(kind, id, {
    fields: parseFieldList(options.fields),
    signal: context.signal,
  })

  return {
    type: 'single',
    fieldSet: result.fieldSet,
    row: result.row,
    warnings: result.warnings,
  }
}
