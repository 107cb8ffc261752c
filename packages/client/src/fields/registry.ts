import { UnknownFieldError } from '../errors.js'
import type { FieldSet, FieldSpec } from './field-spec.js'
import { suggestClosest } from './suggest.js'

export type ProjectionMode = 'list' | 'detail'

/**
 * What a resource module supplies to populate its registry: the fields it
 * knows, the default projections, and where the resource lives on the API.
 */
export interface ResourceDefinition {
  kind: string
  /** API collection path, e.g. `/sessions` */
  path: string
  fields: readonly FieldSpec[]
  defaults: Record<ProjectionMode, readonly string[]>
}

/** Read-only field lookup for one resource kind */
export class FieldRegistry {
  readonly kind: string
  readonly path: string
  private readonly byKey: ReadonlyMap<string, FieldSpec>
  private readonly byAltName: ReadonlyMap<string, FieldSpec>
  private readonly fields: FieldSet
  private readonly defaultSets: Readonly<Record<ProjectionMode, FieldSet>>

  constructor(definition: ResourceDefinition) {
    const byKey = new Map<string, FieldSpec>()
    const byAltName = new Map<string, FieldSpec>()

    for (const field of definition.fields) {
      if (byKey.has(field.key)) {
        throw new Error(`Duplicate field "${field.key}" in ${definition.kind} registry`)
      }
      byKey.set(field.key, field)
    }
    for (const field of definition.fields) {
      if (field.altName && !byKey.has(field.altName)) {
        byAltName.set(field.altName, field)
      }
    }

    const resolveDefaults = (mode: ProjectionMode): FieldSet =>
      Object.freeze(
        definition.defaults[mode].map((key) => {
          const field = byKey.get(key)
          if (!field) {
            throw new Error(`Default ${mode} field "${key}" is not declared for ${definition.kind}`)
          }
          return field
        })
      )

    this.kind = definition.kind
    this.path = definition.path
    this.byKey = byKey
    this.byAltName = byAltName
    this.fields = Object.freeze([...definition.fields])
    this.defaultSets = Object.freeze({
      list: resolveDefaults('list'),
      detail: resolveDefaults('detail'),
    })
    Object.freeze(this)
  }

  defaults(mode: ProjectionMode): FieldSet {
    return this.defaultSets[mode]
  }

  allFields(): FieldSet {
    return this.fields
  }

  has(key: string): boolean {
    return this.byKey.has(key) || this.byAltName.has(key)
  }

  /** Resolve a key (or alternate name); throws UnknownFieldError with suggestions */
  lookup(key: string): FieldSpec {
    const field = this.byKey.get(key) ?? this.byAltName.get(key)
    if (field) {
      return field
    }
    const validKeys = [...this.byKey.keys()]
    throw new UnknownFieldError({
      resourceKind: this.kind,
      fieldKey: key,
      suggestions: suggestClosest(key, validKeys),
      validKeys,
    })
  }
}

/** All registries, built once at startup and passed by reference */
export class RegistryCatalog {
  private readonly registries: ReadonlyMap<string, FieldRegistry>

  constructor(registries: readonly FieldRegistry[]) {
    const map = new Map<string, FieldRegistry>()
    for (const registry of registries) {
      if (map.has(registry.kind)) {
        throw new Error(`Resource kind "${registry.kind}" registered twice`)
      }
      map.set(registry.kind, registry)
    }
    this.registries = map
    Object.freeze(this)
  }

  get(kind: string): FieldRegistry {
    const registry = this.registries.get(kind)
    if (!registry) {
      throw new Error(`Unknown resource kind "${kind}". Known kinds: ${this.kinds().join(', ')}`)
    }
    return registry
  }

  kinds(): string[] {
    return [...this.registries.keys()]
  }
}

export function createRegistryCatalog(definitions: readonly ResourceDefinition[]): RegistryCatalog {
  return new RegistryCatalog(definitions.map((definition) => new FieldRegistry(definition)))
}
