import { Command } from 'commander'
import {
  WarningLog,
  defineField,
  projectRecord,
  valueFormats,
  type FieldRegistry,
  type FieldSet,
  type FieldSpec,
  type ProjectedRow,
  type RegistryCatalog,
  type WireRecord,
} from '@computectl/client'
import { withOutput, type CliRuntime, type CommandContext, type CommandError, type ListOutput } from '../output/index.js'

/** Columns of `computectl fields`: one row per declared field */
export const fieldCatalogFieldSet: FieldSet = Object.freeze([
  defineField('key'),
  defineField('display_name', { displayName: 'Name' }),
  defineField('wire_path'),
  defineField('alt_name'),
  defineField('min_version', { displayName: 'Since' }),
  defineField('defaults', valueFormats.list),
])

/** Accept both `scaling_group` and `scaling-group` */
export function findRegistry(catalog: RegistryCatalog, name: string): FieldRegistry {
  const kind = name.trim().replace(/-/g, '_')
  if (!catalog.kinds().includes(kind)) {
    const error: CommandError = {
      code: 'UNKNOWN_RESOURCE_KIND',
      message: `Unknown resource kind "${name}".`,
      details: `Known kinds: ${catalog.kinds().join(', ')}`,
    }
    throw error
  }
  return catalog.get(kind)
}

function describeField(field: FieldSpec, registry: FieldRegistry): WireRecord {
  const defaults = (['list', 'detail'] as const).filter((mode) =>
    registry.defaults(mode).some((candidate) => candidate.key === field.key)
  )
  return {
    key: field.key,
    display_name: field.displayName,
    wire_path: typeof field.wirePath === 'string' ? field.wirePath : field.wirePath.join(', '),
    alt_name: field.altName,
    min_version: field.minServerVersion,
    defaults: defaults.length > 0 ? defaults : undefined,
  }
}

export async function runFieldsCommand(context: CommandContext, kind: string): Promise<ListOutput> {
  const registry = findRegistry(context.catalog, kind)
  const fields = registry.allFields()

  async function* rows(): AsyncGenerator<ProjectedRow, void, undefined> {
    for (const [index, field] of fields.entries()) {
      yield projectRecord(describeField(field, registry), fieldCatalogFieldSet, index).row
    }
  }

  return {
    type: 'list',
    fieldSet: fieldCatalogFieldSet,
    rows: rows(),
    warnings: new WarningLog(),
    summary: () => ({ fetched: fields.length, totalCount: fields.length, pagesFetched: 0, initialOffset: 0, truncated: false }),
  }
}

export function createFieldsCommand(runtime: CliRuntime): Command {
  return new Command('fields')
    .description('List the fields a resource kind can show, with their minimum server versions')
    .argument('<kind>', 'resource kind: job, user, image, scaling-group, keypair-resource-policy')
    .action(withOutput(runtime, (context, args) => runFieldsCommand(context, args[0])))
}
