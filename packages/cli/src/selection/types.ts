import type { SelectionKind } from '../errors'

export type SelectorKind = 'fuzzy' | 'numbered'

export interface SelectionPrompt {
  message: string
  kind: SelectionKind // What is being chosen, used in error messages
}

export interface SelectorChoice<T> {
  key: string // Name or id the choice is looked up by
  label: string // Line shown to the user
  value: T
}

/**
 * Interactive pick from a non-empty list of choices.
 * Resolves `undefined` when the user cancels or leaves the prompt empty.
 */
export interface Selector {
  readonly kind: SelectorKind
  select: <T>(choices: SelectorChoice<T>[], prompt: SelectionPrompt) => Promise<T | undefined>
}
