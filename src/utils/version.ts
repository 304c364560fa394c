import { readFileSync } from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'

const PackageJsonSchema = z.object({
  name: z.string(),
  version: z.string(),
})

const __dirname = dirname(fileURLToPath(import.meta.url))
const packageJson = PackageJsonSchema.parse(
  JSON.parse(readFileSync(resolve(__dirname, '../../package.json'), 'utf8')),
)

/** Application version from package.json */
export const APP_VERSION: string = packageJson.version

/**
 * Standard User-Agent header for outbound requests
 * Format: "homework-review-watcher/1.0.0"
 */
export const USER_AGENT = `${packageJson.name}/${APP_VERSION}`
