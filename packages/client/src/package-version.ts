import { existsSync, readFileSync } from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

type ResolvePackageVersionParams = {
  moduleUrl: string
  packageName: string
}

type PackageJson = {
  name?: unknown
  version?: unknown
}

export class PackageVersionResolutionError extends Error {
  constructor(params: { moduleUrl: string; packageName: string }) {
    super(`Unable to resolve ${params.packageName} version from module URL ${params.moduleUrl}.`)
    this.name = 'PackageVersionResolutionError'
  }
}

function readPackageJson(packageJsonPath: string): PackageJson | null {
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'))
    if (typeof parsed !== 'object' || parsed === null) {
      return null
    }
    return {
      name: 'name' in parsed ? parsed.name : undefined,
      version: 'version' in parsed ? parsed.version : undefined,
    }
  } catch {
    // Unreadable manifests are skipped; the walk continues upwards.
    return null
  }
}

/**
 * Walk up from `moduleUrl` to the package.json named `packageName` and return
 * its version.
 */
export function resolvePackageVersion(params: ResolvePackageVersionParams): string {
  let currentDir = path.dirname(fileURLToPath(params.moduleUrl))

  while (true) {
    const packageJsonPath = path.join(currentDir, 'package.json')
    if (existsSync(packageJsonPath)) {
      const packageJson = readPackageJson(packageJsonPath)
      if (packageJson?.name === params.packageName) {
        if (typeof packageJson.version === 'string' && packageJson.version.trim().length > 0) {
          return packageJson.version.trim()
        }
        throw new PackageVersionResolutionError(params)
      }
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      break
    }
    currentDir = parentDir
  }

  throw new PackageVersionResolutionError(params)
}
