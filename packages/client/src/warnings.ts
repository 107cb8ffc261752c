export type WarningCode =
  | 'SERVER_VERSION_DEGRADED'
  | 'FIELD_DROPPED'
  | 'CELL_RENDER_FAILED'
  | 'LISTING_TRUNCATED'

export interface QueryWarning {
  code: WarningCode
  message: string
}

/**
 * Warnings collected over one command. Kept apart from the row stream so
 * structured output never has to carry them.
 */
export class WarningLog {
  private readonly entries: QueryWarning[] = []

  add(code: WarningCode, message: string): void {
    this.entries.push({ code, message })
  }

  addAll(warnings: readonly QueryWarning[]): void {
    for (const warning of warnings) {
      this.entries.push(warning)
    }
  }

  list(): readonly QueryWarning[] {
    return [...this.entries]
  }

  get size(): number {
    return this.entries.length
  }
}
