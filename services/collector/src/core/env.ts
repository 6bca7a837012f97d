// services/collector/src/core/env.ts
import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones. Returns the files that were read.
 */
export function loadEnv(cwd: string = process.cwd()): string[] {
    const env = String(process.env.NODE_ENV || 'development')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${env}`),
        path.resolve(cwd, '.env.local'),
    ]

    const loaded: string[] = []
    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
            loaded.push(file)
        }
    }
    return loaded
}
