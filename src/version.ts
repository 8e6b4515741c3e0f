import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'

function getPackageVersion(): string | undefined {
  try {
    // Walk up from this module to the nearest package.json (src/ or dist/ layouts)
    let dir = path.dirname(fileURLToPath(import.meta.url))
    for (let i = 0; i < 5; i++) {
      const pkgPath = path.join(dir, 'package.json')
      if (fs.existsSync(pkgPath)) {
        const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'))
        if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
          return pkg.version
        }
        return undefined
      }
      dir = path.dirname(dir)
    }
    return undefined
  } catch {
    return undefined
  }
}

// Injected at build time or read from package.json
export const VERSION = process.env.EDGECTL_VERSION || getPackageVersion() || '0.0.0'
