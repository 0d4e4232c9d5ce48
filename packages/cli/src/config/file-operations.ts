import type { z } from 'zod'
import type { ApiKeyEntry, LauncherPaths, ModelEntry, Settings } from './types'
import * as fs from 'node:fs'
import * as path from 'node:path'
import { LauncherError } from '../errors'
import { configFileSchema, describeIssue, modelsFileSchema, settingsSchema } from './schema'

/**
 * Read-only access to the three launcher configuration files
 */
export class ConfigFileManager {
  constructor(readonly paths: LauncherPaths) {}

  /**
   * Paths of the configuration files that do not exist, in a stable order
   */
  findMissingFiles(): string[] {
    const { configFile, modelsFile, settingsFile } = this.paths
    return [configFile, modelsFile, settingsFile].filter(file => !fs.existsSync(file))
  }

  validate(): void {
    const missing = this.findMissingFiles()
    if (missing.length > 0) {
      throw LauncherError.configMissing(missing, this.paths.configDir)
    }
  }

  loadApiKeys(): ApiKeyEntry[] {
    return this.readDocument(this.paths.configFile, configFileSchema).apiKeys
  }

  loadModels(): ModelEntry[] {
    return this.readDocument(this.paths.modelsFile, modelsFileSchema).data
  }

  loadSettings(): Settings {
    return this.readDocument(this.paths.settingsFile, settingsSchema)
  }

  private readDocument<T extends z.ZodTypeAny>(file: string, schema: T): z.output<T> {
    const name = path.basename(file)

    let raw: unknown
    try {
      raw = JSON.parse(fs.readFileSync(file, 'utf-8'))
    }
    catch (error) {
      const cause = error instanceof Error ? error : undefined
      throw LauncherError.configParse(name, cause?.message ?? 'Unknown error', cause)
    }

    const result = schema.safeParse(raw)
    if (!result.success) {
      throw LauncherError.configParse(name, describeIssue(result.error), result.error)
    }
    return result.data
  }
}
