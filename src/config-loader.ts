import path from 'node:path'
import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv'
import { CONFIG_FILE_NAMES, createDefaultConfig } from './defaults.js'
import schema from './schema.json' with { type: 'json' }
import { isFile, readText } from './text.js'
import type { ContextLintConfig } from './types.js'

const SCHEMA_ID = 'contextlint-config'

// Non-negative integer, or its decimal digits as a string
type LineCount = number | string

interface NestedConfigFile {
  line_budget?: {
    default_warn?: LineCount
    default_error?: LineCount
    router_warn?: LineCount
    per_file?: Record<string, LineCount>
  }
  ignore?: {
    paths?: string[]
    refs?: string[]
    files?: string[] // legacy alias of paths
  }
  discovery?: {
    extra_globs?: string[]
    disable_defaults?: boolean
  }
}

interface LegacyConfigFile {
  soft_warn_lines?: LineCount
  hard_fail_lines?: LineCount
  router_warn_lines?: LineCount
  ignore?: string[]
}

type ConfigShape = 'nested' | 'legacy'

export class ConfigLoader {
  private static ajvInstance: Ajv | null = null
  private static nestedValidator: ValidateFunction<NestedConfigFile> | null = null
  private static legacyValidator: ValidateFunction<LegacyConfigFile> | null = null

  /**
   * Get cached AJV instance (lazy singleton).
   * No type coercion: `null` or `true` for a line count is invalid.
   */
  private getAjv(): Ajv {
    if (!ConfigLoader.ajvInstance) {
      ConfigLoader.ajvInstance = new Ajv({
        allErrors: true,
      })
      ConfigLoader.ajvInstance.addSchema(schema)
    }
    return ConfigLoader.ajvInstance
  }

  private getNestedValidator(): ValidateFunction<NestedConfigFile> {
    if (!ConfigLoader.nestedValidator) {
      ConfigLoader.nestedValidator = this.getAjv().compile<NestedConfigFile>({
        $ref: `${SCHEMA_ID}#/definitions/nested`,
      })
    }
    return ConfigLoader.nestedValidator
  }

  private getLegacyValidator(): ValidateFunction<LegacyConfigFile> {
    if (!ConfigLoader.legacyValidator) {
      ConfigLoader.legacyValidator = this.getAjv().compile<LegacyConfigFile>({
        $ref: `${SCHEMA_ID}#/definitions/legacy`,
      })
    }
    return ConfigLoader.legacyValidator
  }

  /**
   * Load .contextlintrc.json (or legacy .contextlintrc) from root,
   * or the explicit path when given. Never throws: anything that cannot
   * be read, parsed or validated yields the defaults.
   */
  load(root: string, explicitPath?: string): ContextLintConfig {
    const configPath = this.locate(root, explicitPath)
    if (configPath === null) {
      return createDefaultConfig()
    }

    const raw = this.readJson(configPath)
    if (!isPlainObject(raw)) {
      return createDefaultConfig()
    }

    if (detectShape(raw) === 'nested') {
      const validate = this.getNestedValidator()
      if (validate(raw)) {
        return this.fromNested(raw)
      }
      this.warnInvalid(configPath, validate.errors ?? [])
      return createDefaultConfig()
    }

    const validate = this.getLegacyValidator()
    if (validate(raw)) {
      return this.fromLegacy(raw)
    }
    this.warnInvalid(configPath, validate.errors ?? [])
    return createDefaultConfig()
  }

  private locate(root: string, explicitPath?: string): string | null {
    if (explicitPath !== undefined) {
      const resolved = path.resolve(explicitPath)
      return isFile(resolved) ? resolved : null
    }
    for (const name of CONFIG_FILE_NAMES) {
      const candidate = path.join(root, name)
      if (isFile(candidate)) {
        return candidate
      }
    }
    return null
  }

  private readJson(configPath: string): unknown {
    const content = readText(configPath)
    if (content === null) {
      return null
    }
    try {
      return JSON.parse(content)
    } catch {
      console.warn(`Warning: Config file "${configPath}" is invalid JSON. Using defaults.`)
      return null
    }
  }

  private fromNested(raw: NestedConfigFile): ContextLintConfig {
    const config = createDefaultConfig()

    const budget = raw.line_budget ?? {}
    config.default_warn = toCount(budget.default_warn, config.default_warn)
    config.default_error = toCount(budget.default_error, config.default_error)
    config.router_warn_lines = toCount(budget.router_warn, config.router_warn_lines)
    config.per_file_error = Object.fromEntries(
      Object.entries(budget.per_file ?? {}).map(([relPath, limit]) => [relPath, Number(limit)]),
    )

    const ignore = raw.ignore ?? {}
    config.ignore_paths = unique([...(ignore.paths ?? []), ...(ignore.files ?? [])])
    config.ignore_refs = unique(ignore.refs ?? [])

    const discovery = raw.discovery ?? {}
    config.extra_globs = [...(discovery.extra_globs ?? [])]
    config.disable_default_discovery = discovery.disable_defaults ?? false

    return config
  }

  private fromLegacy(raw: LegacyConfigFile): ContextLintConfig {
    const config = createDefaultConfig()
    config.default_warn = toCount(raw.soft_warn_lines, config.default_warn)
    config.default_error = toCount(raw.hard_fail_lines, config.default_error)
    config.router_warn_lines = toCount(raw.router_warn_lines, config.router_warn_lines)
    config.ignore_paths = unique(raw.ignore ?? [])
    return config
  }

  private warnInvalid(configPath: string, errors: ErrorObject[]): void {
    console.warn(
      `Warning: Config file "${configPath}" is invalid. Using defaults.\n${formatValidationErrors(errors)}`,
    )
  }
}

export function loadConfig(root: string, explicitPath?: string): ContextLintConfig {
  return new ConfigLoader().load(root, explicitPath)
}

/**
 * Nested when a known section is present. A top-level `ignore` list
 * belongs to the legacy flat shape, an `ignore` object to the nested one.
 */
function detectShape(raw: Record<string, unknown>): ConfigShape {
  if ('line_budget' in raw || 'discovery' in raw) {
    return 'nested'
  }
  if ('ignore' in raw && !Array.isArray(raw.ignore)) {
    return 'nested'
  }
  return 'legacy'
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function toCount(value: LineCount | undefined, fallback: number): number {
  return value === undefined ? fallback : Number(value)
}

function unique(values: string[]): string[] {
  return Array.from(new Set(values))
}

function formatValidationErrors(errors: ErrorObject[]): string {
  return errors
    .map((err) => {
      const field = err.instancePath || 'root'
      return `  - ${field}: ${err.message ?? 'is invalid'}`
    })
    .join('\n')
}
