import { basename } from 'node:path'
import { get } from 'svelte/store'
import { MSG_LOAD_IN_PROGRESS, MSG_NO_CHANGES, MSG_SAVE_IN_PROGRESS, MSG_SAVING, saveFailed, savedCount } from '../messages'
import type { Match, SaveSummary, WriteResult } from '../model/types'
import { anyDirty, dirtyPaths } from './helpers'
import type { EditorStores } from './stores'

type Deps = {
  saveFile: (path: string, matches: readonly Match[], passthrough: readonly unknown[]) => Promise<WriteResult>
  showToast: (msg: string, durationMs?: number) => void
}

type SaveStores = Pick<EditorStores, 'files' | 'loading' | 'saving' | 'status' | 'error' | 'generation'>

export const createSaveCoordinator = (stores: SaveStores, deps: Deps) => {
  const { files, loading, saving, status, error, generation } = stores
  const { saveFile, showToast } = deps

  const hasUnsavedChanges = () => anyDirty(get(files))

  const pendingCount = () => dirtyPaths(get(files)).length

  /** Null when a save or a load is still running; nothing is written then. */
  const saveAll = async (): Promise<SaveSummary | null> => {
    if (get(saving) || get(loading)) {
      showToast(get(saving) ? MSG_SAVE_IN_PROGRESS : MSG_LOAD_IN_PROGRESS)
      return null
    }
    const summary: SaveSummary = { saved: [], failed: [] }
    const targets = dirtyPaths(get(files))
    if (targets.length === 0) {
      status.set(MSG_NO_CHANGES)
      showToast(MSG_NO_CHANGES)
      return summary
    }

    saving.set(true)
    status.set(MSG_SAVING)
    const loadGeneration = get(generation)
    try {
      for (const path of targets) {
        if (get(generation) !== loadGeneration) break
        const entry = get(files).get(path)
        if (!entry) continue
        const result = await saveFile(path, entry.matches, entry.passthrough)
        if (!result.ok) {
          summary.failed.push({ path, error: result.error })
          continue
        }
        summary.saved.push(path)
        files.update((all) => {
          const latest = all.get(path)
          if (!latest || get(generation) !== loadGeneration) return all
          const next = new Map(all)
          // Edits made while the write was in flight keep the entry dirty.
          next.set(path, {
            ...latest,
            dirty: latest.matches !== entry.matches,
            savedRevision: latest.savedRevision + 1,
          })
          return next
        })
      }
    } finally {
      saving.set(false)
    }

    if (summary.failed.length > 0) {
      const message = saveFailed(summary.failed.map((item) => `${basename(item.path)}: ${item.error}`))
      error.set(message)
      showToast(message, 5000)
    } else {
      error.set('')
    }
    status.set(savedCount(summary.saved.length))
    return summary
  }

  return {
    hasUnsavedChanges,
    pendingCount,
    saveAll,
  }
}
