import { get } from 'svelte/store'
import { createMatch, fromDisplay, isComplex, toDisplay, withField } from '../model/match'
import type { AddOutcome, EditField, EditOutcome, FileEntry, Match, Snapshot } from '../model/types'
import { ERROR_NO_FILE_TO_ADD, ERROR_TRIGGER_EMPTY, MSG_CANNOT_EDIT_COMPLEX, triggerExists } from '../messages'
import { anyDirty, hasTrigger, patchFile } from './helpers'
import type { UndoHistory } from './history'
import type { EditorStores } from './stores'

export type CellEdit = {
  /** Trigger as currently shown in the row, escaped. */
  displayTrigger: string
  field: EditField
  /** Cell text as typed, escaped. */
  value: string
}

type TableSliceStores = Pick<EditorStores, 'files' | 'activePath'>

export const createTableSlice = (stores: TableSliceStores, history: UndoHistory) => {
  const { files, activePath } = stores

  const activeEntry = (): FileEntry | null => {
    const path = get(activePath)
    return path ? get(files).get(path) ?? null : null
  }

  const capture = (path: string, description: string): Snapshot | null => {
    const all = get(files)
    const entry = all.get(path)
    if (!entry) return null
    return {
      path,
      matches: entry.matches,
      dirty: entry.dirty,
      anyDirty: anyDirty(all),
      savedRevision: entry.savedRevision,
      description,
    }
  }

  const commit = (path: string, description: string, matches: readonly Match[]) => {
    const snapshot = capture(path, description)
    if (snapshot) history.record(snapshot)
    files.update((all) => patchFile(all, path, { matches, dirty: true }))
  }

  const findMatchByDisplayedTrigger = (displayTrigger: string) => {
    const entry = activeEntry()
    if (!entry) return null
    const index = entry.matches.findIndex((match) => toDisplay(match.trigger) === displayTrigger)
    return index >= 0 ? { match: entry.matches[index], index } : null
  }

  const findMatchById = (id: string) => {
    const entry = activeEntry()
    if (!entry) return null
    const index = entry.matches.findIndex((match) => match.id === id)
    return index >= 0 ? { match: entry.matches[index], index } : null
  }

  const applyCellEdit = ({ displayTrigger, field, value }: CellEdit): EditOutcome => {
    const entry = activeEntry()
    if (!entry) {
      return { status: 'rejected', reason: 'no-file', revertTo: null, message: null }
    }
    const found = findMatchByDisplayedTrigger(displayTrigger)
    if (!found) {
      return { status: 'rejected', reason: 'not-found', revertTo: null, message: null }
    }
    const { match, index } = found
    const previous = toDisplay(match[field])
    if (isComplex(match)) {
      return { status: 'rejected', reason: 'complex', revertTo: previous, message: MSG_CANNOT_EDIT_COMPLEX }
    }

    const next = fromDisplay(value)
    if (next === match[field]) return { status: 'unchanged' }

    if (field === 'trigger') {
      if (next.trim().length === 0) {
        return { status: 'rejected', reason: 'empty-trigger', revertTo: previous, message: ERROR_TRIGGER_EMPTY }
      }
      if (hasTrigger(entry.matches, next, match.id)) {
        return { status: 'rejected', reason: 'duplicate', revertTo: previous, message: triggerExists(next) }
      }
    }

    const updated = withField(match, field, next)
    const matches = [...entry.matches]
    matches[index] = updated
    commit(entry.path, `Edit ${field} of '${match.trigger}'`, matches)
    return { status: 'applied', match: updated }
  }

  const addMatch = (trigger: string, replace: string): AddOutcome => {
    const entry = activeEntry()
    if (!entry) return { ok: false, reason: 'no-file', message: ERROR_NO_FILE_TO_ADD }
    const nextTrigger = fromDisplay(trigger)
    if (nextTrigger.trim().length === 0) {
      return { ok: false, reason: 'empty-trigger', message: ERROR_TRIGGER_EMPTY }
    }
    if (hasTrigger(entry.matches, nextTrigger)) {
      return { ok: false, reason: 'duplicate', message: triggerExists(nextTrigger) }
    }
    const match = createMatch(nextTrigger, fromDisplay(replace))
    commit(entry.path, `Add '${nextTrigger}'`, [...entry.matches, match])
    return { ok: true, match }
  }

  /** Stale rows are skipped; returns how many matches were removed. */
  const deleteMatches = (displayTriggers: readonly string[]) => {
    const entry = activeEntry()
    if (!entry) return 0
    const ids = new Set<string>()
    for (const displayTrigger of displayTriggers) {
      const found = findMatchByDisplayedTrigger(displayTrigger)
      if (found) ids.add(found.match.id)
    }
    if (ids.size === 0) return 0
    commit(
      entry.path,
      `Delete ${ids.size} snippet(s)`,
      entry.matches.filter((match) => !ids.has(match.id)),
    )
    return ids.size
  }

  const restore = (snapshot: Snapshot) => {
    files.update((all) => {
      const entry = all.get(snapshot.path)
      if (!entry) return all
      // Saved since the snapshot: disk no longer holds the restored list.
      const dirty = snapshot.dirty || entry.savedRevision !== snapshot.savedRevision
      return patchFile(all, snapshot.path, { matches: snapshot.matches, dirty })
    })
    activePath.set(snapshot.path)
  }

  const undo = (): Snapshot | null => {
    const snapshot = history.takeUndo()
    if (!snapshot) return null
    const current = capture(snapshot.path, snapshot.description)
    if (!current) return null
    history.pushRedo(current)
    restore(snapshot)
    return snapshot
  }

  const redo = (): Snapshot | null => {
    const snapshot = history.takeRedo()
    if (!snapshot) return null
    const current = capture(snapshot.path, snapshot.description)
    if (!current) return null
    history.pushUndo(current)
    restore(snapshot)
    return snapshot
  }

  return {
    findMatchByDisplayedTrigger,
    findMatchById,
    applyCellEdit,
    addMatch,
    deleteMatches,
    undo,
    redo,
  }
}
