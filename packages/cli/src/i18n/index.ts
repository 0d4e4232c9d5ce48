import process from 'node:process'
import { createTranslator as createIntlTranslator } from 'use-intl/core'
import enUS from './locales/en-US.json'
import zhCN from './locales/zh-CN.json'

export const locales = ['en-US', 'zh-CN'] as const
export type Locale = (typeof locales)[number]

export const defaultLocale: Locale = 'en-US'

export type Messages = typeof enUS
export type MessageKey = keyof Messages
export type MessageParams = Record<string, string | number>
export type Translator = (key: MessageKey, params?: MessageParams) => string

const catalogs: Record<Locale, Messages> = {
  'en-US': enUS,
  'zh-CN': zhCN,
}

function isLocale(value: string): value is Locale {
  return (locales as readonly string[]).includes(value)
}

/**
 * Map a POSIX locale string (e.g. `zh_CN.UTF-8`) onto a supported locale
 */
export function normalizeLocale(raw: string): Locale | undefined {
  // Strip encoding and modifier: zh_CN.UTF-8@pinyin -> zh_CN
  const tag = raw.split('.')[0].split('@')[0].replace('_', '-')
  if (!tag || tag === 'C' || tag === 'POSIX') {
    return undefined
  }

  if (isLocale(tag)) {
    return tag
  }

  switch (tag.split('-')[0].toLowerCase()) {
    case 'zh':
      return 'zh-CN'
    case 'en':
      return 'en-US'
  }

  return undefined
}

/**
 * Detect the message locale from the environment, first match wins
 */
export function detectLocale(env: NodeJS.ProcessEnv = process.env): Locale {
  const candidates = [env.BRIDGE_LAUNCHER_LANG, env.LC_ALL, env.LC_MESSAGES, env.LANG]

  for (const candidate of candidates) {
    if (!candidate) {
      continue
    }
    const locale = normalizeLocale(candidate)
    if (locale) {
      return locale
    }
  }

  return defaultLocale
}

export function createTranslator(locale: Locale = defaultLocale): Translator {
  const translate = createIntlTranslator({ locale, messages: catalogs[locale] })

  return (key, params) => translate(key, params)
}
