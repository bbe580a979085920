import { isComplex, previewText, toDisplay } from '../model/match'
import type { DisplayRow, FileEntry, Match } from '../model/types'

export const UNDO_LIMIT = 50

const compareString = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0)

/** Simple before complex, then case-insensitive trigger; storage order breaks ties. */
export const sortMatches = (list: readonly Match[]): Match[] => {
  const decorated = list.map((match, index) => ({
    match,
    index,
    rank: isComplex(match) ? 1 : 0,
    key: match.trigger.toLowerCase(),
  }))
  decorated.sort((a, b) => {
    const rankCmp = a.rank - b.rank
    if (rankCmp !== 0) return rankCmp
    const keyCmp = compareString(a.key, b.key)
    if (keyCmp !== 0) return keyCmp
    return a.index - b.index
  })
  return decorated.map((item) => item.match)
}

export const filterMatches = (list: readonly Match[], filter: string): Match[] => {
  const needle = filter.trim().toLowerCase()
  if (needle.length === 0) return [...list]
  return list.filter(
    (match) =>
      match.trigger.toLowerCase().includes(needle) || match.replace.toLowerCase().includes(needle),
  )
}

export const toDisplayRow = (match: Match): DisplayRow => {
  const complex = isComplex(match)
  return {
    id: match.id,
    trigger: toDisplay(match.trigger),
    replace: toDisplay(match.replace),
    replacePreview: previewText(match.replace),
    complex,
    editable: !complex,
  }
}

export const buildRows = (list: readonly Match[], filter: string): DisplayRow[] =>
  filterMatches(sortMatches(list), filter).map(toDisplayRow)

export const hasTrigger = (list: readonly Match[], trigger: string, exceptId?: string) =>
  list.some((match) => match.id !== exceptId && match.trigger === trigger)

export const anyDirty = (files: ReadonlyMap<string, FileEntry>) => {
  for (const entry of files.values()) {
    if (entry.dirty) return true
  }
  return false
}

export const dirtyPaths = (files: ReadonlyMap<string, FileEntry>) =>
  [...files.values()].filter((entry) => entry.dirty).map((entry) => entry.path)

export const patchFile = (
  files: ReadonlyMap<string, FileEntry>,
  path: string,
  patch: Partial<Omit<FileEntry, 'path'>>,
): Map<string, FileEntry> => {
  const next = new Map(files)
  const entry = next.get(path)
  if (entry) {
    next.set(path, { ...entry, ...patch })
  }
  return next
}
