import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { isAbsolute, resolve } from 'node:path'
import { config as loadDotenv } from 'dotenv'
import { parse as parseYaml } from 'yaml'
import { ConfigurationError, ConfigurationErrorCode, type GoalFactsInput } from '@reserva/core'
import { validateGoalFile, validateSettings, type ChatSettings } from './schema'

/**
 * Loads variables from an env file into `process.env` without overriding
 * values already set. A missing file is not an error.
 *
 * @returns Whether a file was loaded
 */
export function loadEnvFile(filePath: string = '.env', cwd: string = process.cwd()): boolean {
  const absolutePath = resolve(cwd, filePath)

  if (!existsSync(absolutePath)) {
    return false
  }

  const result = loadDotenv({ path: absolutePath, override: false })
  if (result.error) {
    throw ConfigurationError.from(result.error, ConfigurationErrorCode.CONFIG_ERROR, {
      path: absolutePath,
    })
  }
  return true
}

export function loadSettings(env: Record<string, string | undefined> = process.env): ChatSettings {
  return validateSettings(env)
}

/**
 * Reads the guest's goal facts from a YAML file.
 *
 * @example
 * ```yaml
 * restaurantName: Trattoria Test
 * guestName: Anna Nowak
 * desiredReservation:
 *   date: 2026-03-11
 *   time: "19:30"
 *   partySize: 4
 * ```
 */
export async function loadGoalFile(
  path: string,
  basePath: string = process.cwd()
): Promise<GoalFactsInput> {
  const absolutePath = isAbsolute(path) ? path : resolve(basePath, path)

  if (!existsSync(absolutePath)) {
    throw new ConfigurationError(`Goal file not found: ${absolutePath}`, {
      code: ConfigurationErrorCode.CONFIG_ERROR,
      context: { path, absolutePath },
    })
  }

  let content: string
  try {
    content = await readFile(absolutePath, 'utf-8')
  } catch (error) {
    throw ConfigurationError.from(error, ConfigurationErrorCode.CONFIG_ERROR, {
      path,
      absolutePath,
    })
  }

  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    throw new ConfigurationError(`Failed to parse YAML: ${message}`, {
      code: ConfigurationErrorCode.INVALID_CONFIG,
      context: { path, absolutePath },
      cause: error instanceof Error ? error : undefined,
    })
  }

  return validateGoalFile(parsed)
}
