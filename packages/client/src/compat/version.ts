/** Parsed version: numeric components in order, e.g. `20.03.1` -> [20, 3, 1] */
export type VersionParts = readonly number[]

const VERSION_REGEX = /^v?(\d+(?:\.\d+)*)(?:[-+].*)?$/

/**
 * Parse a dotted version string. Accepts an optional leading `v` (API versions
 * look like `v6.20220615`) and ignores pre-release or build suffixes.
 * Returns null for anything else.
 */
export function parseVersion(input: string): VersionParts | null {
  const match = VERSION_REGEX.exec(input.trim())
  if (!match) {
    return null
  }
  return match[1].split('.').map((part) => Number.parseInt(part, 10))
}

/** Compare two parsed versions; missing trailing parts count as zero */
export function compareVersionParts(a: VersionParts, b: VersionParts): number {
  const length = Math.max(a.length, b.length)
  for (let i = 0; i < length; i++) {
    const left = a[i] ?? 0
    const right = b[i] ?? 0
    if (left !== right) {
      return left < right ? -1 : 1
    }
  }
  return 0
}

/**
 * Compare two version strings. Throws if either cannot be parsed; callers that
 * accept server-reported values should parse first and handle null.
 */
export function compareVersions(a: string, b: string): number {
  const left = parseVersion(a)
  const right = parseVersion(b)
  if (!left || !right) {
    throw new Error(`Cannot compare versions "${a}" and "${b}"`)
  }
  return compareVersionParts(left, right)
}
