import type { MessageKey, MessageParams, Translator } from './i18n'
import { createTranslator } from './i18n'

export const LAUNCHER_ERROR_CODES = {
  CONFIG_MISSING: 'CONFIG_MISSING',
  CONFIG_PARSE_ERROR: 'CONFIG_PARSE_ERROR',
  DELEGATE_NOT_FOUND: 'DELEGATE_NOT_FOUND',
  INVALID_SELECTION: 'INVALID_SELECTION',
  NO_SELECTION: 'NO_SELECTION',
  NAME_LOOKUP_FAILED: 'NAME_LOOKUP_FAILED',
  NO_CHOICES_AVAILABLE: 'NO_CHOICES_AVAILABLE',
  FUZZY_FINDER_FAILED: 'FUZZY_FINDER_FAILED',
} as const

export type LauncherErrorCode = typeof LAUNCHER_ERROR_CODES[keyof typeof LAUNCHER_ERROR_CODES]

export type SelectionKind = 'apiKey' | 'model'

const messageKeys: Record<LauncherErrorCode, MessageKey> = {
  CONFIG_MISSING: 'configMissing',
  CONFIG_PARSE_ERROR: 'configParseError',
  DELEGATE_NOT_FOUND: 'delegateNotFound',
  INVALID_SELECTION: 'invalidSelection',
  NO_SELECTION: 'noSelection',
  NAME_LOOKUP_FAILED: 'nameLookupFailed',
  NO_CHOICES_AVAILABLE: 'noChoicesAvailable',
  FUZZY_FINDER_FAILED: 'fuzzyFinderFailed',
}

const kindKeys: Record<SelectionKind, MessageKey> = {
  apiKey: 'kindApiKey',
  model: 'kindModel',
}

interface LauncherErrorDetails {
  params?: MessageParams
  kind?: SelectionKind
  hint?: { key: MessageKey, params?: MessageParams }
  cause?: Error
}

/**
 * Terminal failure of a launcher run. Every instance maps to exit code 1 and
 * carries what is needed to render the message in the user's locale.
 */
export class LauncherError extends Error {
  readonly exitCode = 1
  readonly params: MessageParams
  readonly kind?: SelectionKind
  readonly hint?: { key: MessageKey, params?: MessageParams }

  constructor(public readonly code: LauncherErrorCode, details: LauncherErrorDetails = {}) {
    super(renderMessage(createTranslator(), code, details.params ?? {}, details.kind), { cause: details.cause })
    this.name = 'LauncherError'
    this.params = details.params ?? {}
    this.kind = details.kind
    this.hint = details.hint
  }

  localize(t: Translator): string {
    return renderMessage(t, this.code, this.params, this.kind)
  }

  localizeHint(t: Translator): string | undefined {
    return this.hint ? t(this.hint.key, this.hint.params) : undefined
  }

  static configMissing(files: string[], configDir: string): LauncherError {
    return new LauncherError(LAUNCHER_ERROR_CODES.CONFIG_MISSING, {
      params: { files: files.join(', ') },
      hint: { key: 'configMissingHint', params: { dir: configDir } },
    })
  }

  static configParse(file: string, reason: string, cause?: Error): LauncherError {
    return new LauncherError(LAUNCHER_ERROR_CODES.CONFIG_PARSE_ERROR, { params: { file, reason }, cause })
  }

  static delegateNotFound(): LauncherError {
    return new LauncherError(LAUNCHER_ERROR_CODES.DELEGATE_NOT_FOUND, {
      hint: { key: 'delegateInstallHint' },
    })
  }

  static invalidSelection(input: string, max: number): LauncherError {
    return new LauncherError(LAUNCHER_ERROR_CODES.INVALID_SELECTION, { params: { input, max } })
  }

  static noSelection(kind: SelectionKind): LauncherError {
    return new LauncherError(LAUNCHER_ERROR_CODES.NO_SELECTION, { kind })
  }

  static nameLookupFailed(kind: SelectionKind, name: string): LauncherError {
    return new LauncherError(LAUNCHER_ERROR_CODES.NAME_LOOKUP_FAILED, { kind, params: { name } })
  }

  static noChoicesAvailable(kind: SelectionKind, file: string): LauncherError {
    return new LauncherError(LAUNCHER_ERROR_CODES.NO_CHOICES_AVAILABLE, { kind, params: { file } })
  }

  static fuzzyFinderFailed(code: number): LauncherError {
    return new LauncherError(LAUNCHER_ERROR_CODES.FUZZY_FINDER_FAILED, { params: { code } })
  }
}

function renderMessage(t: Translator, code: LauncherErrorCode, params: MessageParams, kind?: SelectionKind): string {
  const resolved = kind ? { ...params, kind: t(kindKeys[kind]) } : params
  return t(messageKeys[code], resolved)
}

export function isLauncherError(error: unknown): error is LauncherError {
  return error instanceof LauncherError
}
