import { basename } from 'node:path'
import { get, writable } from 'svelte/store'
import { isDirectory, modifiedTime } from '@/shared/lib/fs'
import { createModalOpenState } from '@/ui/modalOpenState'
import { matchCommand, type KeyInput, type ShortcutCommandId } from '../shortcuts'
import { showErrorToast, showToast } from './hooks/useToast'
import {
  ERROR_NO_FILE_TO_ADD,
  MSG_INVALID_FOLDER,
  MSG_LOADING_FILES,
  MSG_NOTHING_TO_REDO,
  MSG_NOTHING_TO_UNDO,
  MSG_NO_FILE_SELECTED,
  MSG_PICK_FOLDER,
  MSG_SAVE_IN_PROGRESS,
  fileCreated,
  fileStatus,
  loadWarnings,
  loadedCount,
  noYamlFiles,
  redone,
  snippetAdded,
  undone,
} from './messages'
import { createAddMatchModal } from './modals/addMatchModal'
import { createDeleteConfirmModal } from './modals/deleteConfirmModal'
import { createDeleteFileModal } from './modals/deleteFileModal'
import { createNewFileModal } from './modals/newFileModal'
import { createPackageWarningModal } from './modals/packageWarningModal'
import { createSaveConfirmModal } from './modals/saveConfirmModal'
import { createUnsavedChangesModal } from './modals/unsavedChangesModal'
import { displayNameFor, relativeDisplayName } from './model/displayName'
import type { EditOutcome, FileEntry, LoadedFile, WriteResult } from './model/types'
import { findDefaultMatchDir } from './services/espansoPaths'
import {
  loadLastSelectedFile,
  loadMatchFolder,
  loadSkipPackageWarning,
  loadWindowGeometry,
  storeLastSelectedFile,
  storeMatchFolder,
  storeSkipPackageWarning,
  storeWindowGeometry,
} from './services/settings.service'
import {
  createFile as createSnippetFile,
  deleteFile as deleteSnippetFile,
  loadDirectory,
  saveFile,
  type CreateFileResult,
} from './services/yaml.service'
import { createUndoHistory } from './state/history'
import { createSaveCoordinator } from './state/saveCoordinator'
import { createEditorStores } from './state/stores'
import { createTableSlice, type CellEdit } from './state/tableSlice'

type EditorCallbacks = {
  /** Asked to focus the filter field. */
  onFind?: () => void
}

const toEntry = (file: LoadedFile): FileEntry => ({ ...file, dirty: false, savedRevision: 0 })

export const createEditorState = (callbacks: EditorCallbacks = {}) => {
  const stores = createEditorStores()
  const { rootDir, files, activePath, activeFile, filter, loading, saving, status, error, generation, fileOptions } =
    stores
  // Displayed triggers of the rows selected in the table.
  const selection = writable<string[]>([])

  const history = createUndoHistory()
  const modals = createModalOpenState()
  const table = createTableSlice(stores, history)
  const saver = createSaveCoordinator(stores, { saveFile, showToast })

  const addMatchModal = createAddMatchModal({
    addMatch: table.addMatch,
    modals,
    onAdded: (match) => status.set(snippetAdded(match.trigger)),
  })
  const deleteConfirmModal = createDeleteConfirmModal({
    deleteMatches: (displayTriggers) => {
      const removed = table.deleteMatches(displayTriggers)
      if (removed > 0) selection.set([])
      return removed
    },
    activeFileName: () => get(activeFile)?.displayName ?? null,
    modals,
    showToast,
  })
  const saveConfirmModal = createSaveConfirmModal({
    pendingCount: saver.pendingCount,
    saveAll: saver.saveAll,
    modals,
    showToast,
  })
  const packageWarningModal = createPackageWarningModal({
    loadSkipPackageWarning,
    storeSkipPackageWarning,
    modals,
  })
  const unsavedChangesModal = createUnsavedChangesModal({
    hasUnsavedChanges: saver.hasUnsavedChanges,
    saveAll: saver.saveAll,
    modals,
  })

  const selectFile = async (path: string) => {
    const entry = get(files).get(path)
    if (!entry) return false
    if (get(activePath) !== path) {
      activePath.set(path)
      selection.set([])
    }
    status.set(fileStatus(entry.displayName, entry.matches.length, await modifiedTime(path)))
    await storeLastSelectedFile(path)
    await packageWarningModal.maybeOpen(path)
    return true
  }

  const pickInitialFile = async (preferred: string | null) => {
    const all = get(files)
    if (preferred && all.has(preferred)) return preferred
    const last = await loadLastSelectedFile()
    if (last && all.has(last)) return last
    return get(fileOptions)[0]?.path ?? null
  }

  const load = async (root: string, preferred: string | null = null) => {
    if (get(loading)) return false
    // Reading files a pending write is about to replace would bring old text back.
    if (get(saving)) {
      status.set(MSG_SAVE_IN_PROGRESS)
      showToast(MSG_SAVE_IN_PROGRESS)
      return false
    }
    loading.set(true)
    status.set(MSG_LOADING_FILES)
    try {
      if (!(await isDirectory(root))) {
        status.set(MSG_INVALID_FOLDER)
        error.set(MSG_INVALID_FOLDER)
        showErrorToast(MSG_INVALID_FOLDER)
        return false
      }
      const result = await loadDirectory(root)
      history.clear()
      rootDir.set(root)
      generation.update((n) => n + 1)
      files.set(new Map(result.files.map((file) => [file.path, toEntry(file)])))
      activePath.set(null)
      selection.set([])
      error.set('')
      if (result.errors.length > 0) {
        showErrorToast(loadWarnings(result.errors.map((item) => `${basename(item.path)}: ${item.message}`)))
      }
      if (result.files.length === 0) {
        status.set(noYamlFiles(root))
        return true
      }
      const total = result.files.reduce((sum, file) => sum + file.matches.length, 0)
      status.set(loadedCount(total, result.files.length))
      const initial = await pickInitialFile(preferred)
      if (initial) await selectFile(initial)
      return true
    } finally {
      loading.set(false)
    }
  }

  const init = async () => {
    const saved = await loadMatchFolder()
    if (saved && (await isDirectory(saved))) return load(saved)
    const detected = await findDefaultMatchDir()
    if (detected) return load(detected)
    status.set(MSG_PICK_FOLDER)
    showToast(MSG_PICK_FOLDER, 5000)
    return false
  }

  const openDirectory = async (path: string) => {
    if (!(await unsavedChangesModal.request('open-folder'))) return false
    const loaded = await load(path)
    if (loaded) await storeMatchFolder(path)
    return loaded
  }

  const refresh = async () => {
    const root = get(rootDir)
    if (!root) {
      showToast(MSG_PICK_FOLDER)
      return false
    }
    if (!(await unsavedChangesModal.request('refresh'))) return false
    return load(root, get(activePath))
  }

  /** Resolves true when the window may close. */
  const requestClose = () => unsavedChangesModal.request('quit')

  const registerNewFile = (path: string): FileEntry => {
    const root = get(rootDir) ?? ''
    const all = get(files)
    const taken = new Set([...all.values()].map((entry) => entry.displayName))
    const name = displayNameFor(path)
    const entry: FileEntry = {
      path,
      displayName: taken.has(name) ? relativeDisplayName(root, path) : name,
      matches: [],
      passthrough: [],
      dirty: false,
      savedRevision: 0,
    }
    files.update((current) => new Map(current).set(path, entry))
    return entry
  }

  const newFileModal = createNewFileModal({
    createFile: async (name): Promise<CreateFileResult> => {
      const root = get(rootDir)
      if (!root) return { ok: false, error: MSG_PICK_FOLDER }
      const result = await createSnippetFile(root, name)
      if (result.ok) {
        registerNewFile(result.path)
        await selectFile(result.path)
        showToast(fileCreated(basename(result.path)))
      }
      return result
    },
    hasRoot: () => get(rootDir) !== null,
    modals,
    showToast,
  })

  const forgetFile = async (path: string) => {
    files.update((current) => {
      const next = new Map(current)
      next.delete(path)
      return next
    })
    history.forget(path)
    if (get(activePath) !== path) return
    activePath.set(null)
    selection.set([])
    const next = get(fileOptions)[0]
    if (next) {
      await selectFile(next.path)
    } else {
      status.set(MSG_NO_FILE_SELECTED)
    }
  }

  const deleteFileModal = createDeleteFileModal({
    deleteFile: async (path): Promise<WriteResult> => {
      const result = await deleteSnippetFile(path)
      if (result.ok) await forgetFile(path)
      return result
    },
    modals,
    showToast,
  })

  const editCell = (edit: CellEdit): EditOutcome => {
    const outcome = table.applyCellEdit(edit)
    if (outcome.status === 'rejected' && outcome.message) {
      showErrorToast(outcome.message)
    }
    return outcome
  }

  const undo = () => {
    const snapshot = table.undo()
    status.set(snapshot ? undone(snapshot.description) : MSG_NOTHING_TO_UNDO)
    return snapshot
  }

  const redo = () => {
    const snapshot = table.redo()
    status.set(snapshot ? redone(snapshot.description) : MSG_NOTHING_TO_REDO)
    return snapshot
  }

  const openAddMatch = () => {
    if (!get(activeFile)) {
      showToast(ERROR_NO_FILE_TO_ADD)
      return false
    }
    addMatchModal.open()
    return true
  }

  const requestDeleteRows = (displayTriggers: readonly string[] = get(selection)) =>
    deleteConfirmModal.open(displayTriggers)

  const requestDeleteFile = () => {
    const entry = get(activeFile)
    return deleteFileModal.open(entry ? { path: entry.path, displayName: entry.displayName } : null)
  }

  const cancelDialogs = async () => {
    addMatchModal.close()
    deleteConfirmModal.close()
    saveConfirmModal.close()
    newFileModal.close()
    deleteFileModal.close()
    await packageWarningModal.dismiss()
    await unsavedChangesModal.choose('cancel')
  }

  /** Command bound to the key, or null when it is unbound or blocked by an open dialog. */
  const resolveShortcut = (event: KeyInput): ShortcutCommandId | null => {
    const command = matchCommand(event)
    if (!command) return null
    if (modals.isOpen() && command !== 'cancel') return null
    return command
  }

  const runCommand = async (command: ShortcutCommandId) => {
    switch (command) {
      case 'add':
        openAddMatch()
        return
      case 'new_file':
        newFileModal.open()
        return
      case 'save':
        saveConfirmModal.open()
        return
      case 'refresh':
        await refresh()
        return
      case 'delete':
        requestDeleteRows()
        return
      case 'delete_file':
        requestDeleteFile()
        return
      case 'undo':
        undo()
        return
      case 'redo':
        redo()
        return
      case 'find':
        callbacks.onFind?.()
        return
      case 'cancel':
        if (modals.isOpen()) {
          await cancelDialogs()
        } else {
          filter.set('')
        }
        return
    }
  }

  return {
    ...stores,
    selection,
    anyModalOpen: modals.anyModalOpen,
    canUndo: history.canUndo,
    canRedo: history.canRedo,
    undoLabel: history.undoLabel,
    redoLabel: history.redoLabel,
    dialogs: {
      addMatch: addMatchModal,
      deleteConfirm: deleteConfirmModal,
      saveConfirm: saveConfirmModal,
      newFile: newFileModal,
      deleteFile: deleteFileModal,
      packageWarning: packageWarningModal,
      unsavedChanges: unsavedChangesModal,
    },
    init,
    load,
    openDirectory,
    refresh,
    requestClose,
    selectFile,
    setFilter: (value: string) => filter.set(value),
    setSelection: (displayTriggers: string[]) => selection.set(displayTriggers),
    editCell,
    findMatchByDisplayedTrigger: table.findMatchByDisplayedTrigger,
    findMatchById: table.findMatchById,
    openAddMatch,
    requestDeleteRows,
    requestDeleteFile,
    requestSave: saveConfirmModal.open,
    hasUnsavedChanges: saver.hasUnsavedChanges,
    undo,
    redo,
    resolveShortcut,
    runCommand,
    loadWindowGeometry,
    storeWindowGeometry,
  }
}

export type EditorState = ReturnType<typeof createEditorState>
