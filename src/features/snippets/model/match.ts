import type { Match, MatchExtra } from './types'

export const TRIGGER_KEY = 'trigger'
export const REPLACE_KEY = 'replace'

export const PREVIEW_MAX_LENGTH = 50

let nextMatchId = 0

const createMatchId = () => {
  nextMatchId += 1
  return `match-${nextMatchId}`
}

export const createMatch = (trigger: string, replace: string, extras: readonly MatchExtra[] = []): Match => ({
  id: createMatchId(),
  trigger,
  replace,
  extras,
})

export const withField = (match: Match, field: 'trigger' | 'replace', value: string): Match =>
  field === 'trigger' ? { ...match, trigger: value } : { ...match, replace: value }

const isPlainRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const scalarText = (value: unknown): string | null => {
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return null
}

/**
 * Reads one item of a file's `matches` sequence. Items that are not a mapping with
 * scalar `trigger` and `replace` values return null and are kept aside untouched.
 */
export const matchFromYaml = (item: unknown): Match | null => {
  if (!isPlainRecord(item)) return null
  const trigger = scalarText(item[TRIGGER_KEY])
  const replace = scalarText(item[REPLACE_KEY])
  if (trigger === null || replace === null) return null
  const extras: MatchExtra[] = Object.entries(item).filter(
    ([key]) => key !== TRIGGER_KEY && key !== REPLACE_KEY,
  )
  return createMatch(trigger, replace, extras)
}

export const matchToYaml = (match: Match): Record<string, unknown> => {
  const out: Record<string, unknown> = {
    [TRIGGER_KEY]: match.trigger,
    [REPLACE_KEY]: match.replace,
  }
  for (const [key, value] of match.extras) {
    out[key] = value
  }
  return out
}

// `vars` is one of the extra keys, so it makes a match complex as well.
export const isComplex = (match: Match) => match.extras.length > 0

export const toDisplay = (value: string) =>
  value.replace(/[\\\n\t]/g, (ch) => (ch === '\\' ? '\\\\' : ch === '\n' ? '\\n' : '\\t'))

// Inverse of toDisplay; unknown escapes such as `\r` stay literal.
export const fromDisplay = (value: string) =>
  value.replace(/\\([\\nt])/g, (_, ch: string) => (ch === 'n' ? '\n' : ch === 't' ? '\t' : '\\'))

export const previewText = (value: string, maxLength = PREVIEW_MAX_LENGTH) => {
  const singleLine = value.replace(/\r?\n/g, ' ')
  if (singleLine.length <= maxLength) return singleLine
  return `${singleLine.slice(0, maxLength - 3)}...`
}
