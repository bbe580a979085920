import { derived, writable } from 'svelte/store'
import { APP_TITLE, MSG_READY } from '../messages'
import type { FileEntry } from '../model/types'
import { anyDirty, buildRows } from './helpers'

const compareLabel = (a: string, b: string) => {
  const x = a.toLowerCase()
  const y = b.toLowerCase()
  return x < y ? -1 : x > y ? 1 : 0
}

export const createEditorStores = () => {
  const rootDir = writable<string | null>(null)
  const files = writable<Map<string, FileEntry>>(new Map())
  const activePath = writable<string | null>(null)
  const filter = writable('')
  const loading = writable(false)
  const saving = writable(false)
  const status = writable<string>(MSG_READY)
  const error = writable('')
  // Bumped on every directory load; entries from an older load are stale.
  const generation = writable(0)

  const activeFile = derived([files, activePath], ([$files, $activePath]) =>
    $activePath ? $files.get($activePath) ?? null : null,
  )
  const rows = derived([activeFile, filter], ([$activeFile, $filter]) =>
    $activeFile ? buildRows($activeFile.matches, $filter) : [],
  )
  const modified = derived(files, ($files) => anyDirty($files))
  const title = derived(modified, ($modified) => ($modified ? `${APP_TITLE} *` : APP_TITLE))
  const fileOptions = derived(files, ($files) =>
    [...$files.values()]
      .map((entry) => ({ path: entry.path, label: entry.displayName, dirty: entry.dirty }))
      .sort((a, b) => compareLabel(a.label, b.label)),
  )

  return {
    rootDir,
    files,
    activePath,
    filter,
    loading,
    saving,
    status,
    error,
    generation,
    activeFile,
    rows,
    modified,
    title,
    fileOptions,
  }
}

export type EditorStores = ReturnType<typeof createEditorStores>
