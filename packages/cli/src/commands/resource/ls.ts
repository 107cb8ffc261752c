import type { ListOutput, CommandContext, CommandOptions } from '../../output/index.js'
import { collectFilters, optionalInt, parseFieldList, type ResourceFilterOption } from './options.js'

export async function runLsCommand(
  kind: string,
  filterOptions: readonly ResourceFilterOption[],
  context: CommandContext,
  options: CommandOptions
): Promise<ListOutput> {
  const client = await context.connect()
  const result = client.listQuery(kind, {
    filters: collectFilters(options, filterOptions),
    fields: parseFieldList(options.fields),
    pageSize: optionalInt(options.pageSize) ?? context.config.pageSize,
    maxItems: optionalInt(options.maxItems) ?? context.config.maxItems,
    offset: optionalInt(options.offset),
    prefetch: true,
    signal: context.signal,
  })

  return {
    type: 'list',
    fieldSet: result.fieldSet,
    rows: result.rows,
    warnings: result.warnings,
    summary: result.summary,
  }
}
