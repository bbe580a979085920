import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, join } from 'node:path'
import { get } from 'svelte/store'
import { parse } from 'yaml'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { pathExists } from '@/shared/lib/fs'

const { settings, writeGate, findDefaultMatchDirMock, showToastMock, showErrorToastMock } = vi.hoisted(() => {
  const values: { matchFolder: string | null; lastSelectedFile: string | null; skipPackageWarning: boolean } = {
    matchFolder: null,
    lastSelectedFile: null,
    skipPackageWarning: false,
  }
  // Writes wait for this promise when a test holds them open.
  const gate: { held: Promise<void> | null } = { held: null }
  return {
    settings: values,
    writeGate: gate,
    findDefaultMatchDirMock: vi.fn(),
    showToastMock: vi.fn(),
    showErrorToastMock: vi.fn(),
  }
})

vi.mock('./services/settings.service', () => ({
  loadMatchFolder: vi.fn(async () => settings.matchFolder),
  storeMatchFolder: vi.fn(async (value: string) => {
    settings.matchFolder = value
  }),
  loadLastSelectedFile: vi.fn(async () => settings.lastSelectedFile),
  storeLastSelectedFile: vi.fn(async (value: string) => {
    settings.lastSelectedFile = value
  }),
  loadWindowGeometry: vi.fn(async () => null),
  storeWindowGeometry: vi.fn(async () => undefined),
  loadSkipPackageWarning: vi.fn(async () => settings.skipPackageWarning),
  storeSkipPackageWarning: vi.fn(async (value: boolean) => {
    settings.skipPackageWarning = value
  }),
}))

vi.mock('./services/yaml.service', async () => {
  const actual = await vi.importActual<typeof import('./services/yaml.service')>('./services/yaml.service')
  return {
    ...actual,
    saveFile: vi.fn(async (...args: Parameters<typeof actual.saveFile>) => {
      await writeGate.held
      return actual.saveFile(...args)
    }),
  }
})

vi.mock('./services/espansoPaths', () => ({
  findDefaultMatchDir: findDefaultMatchDirMock,
}))

vi.mock('./hooks/useToast', () => ({
  showToast: showToastMock,
  showErrorToast: showErrorToastMock,
}))

import { createEditorState } from './state'

const BASE_YAML = `matches:
  - trigger: ":hi"
    replace: "Hello"
  - trigger: ":bye"
    replace: "Goodbye"
`

const NOTES_YAML = `matches:
  - trigger: ":sig"
    replace: "Regards"
`

const keyInput = (key: string, ctrlKey = false) => ({
  key,
  ctrlKey,
  metaKey: false,
  altKey: false,
  shiftKey: false,
})

let root = ''

const put = async (relPath: string, content: string) => {
  const path = join(root, relPath)
  await mkdir(dirname(path), { recursive: true })
  await writeFile(path, content, 'utf8')
  return path
}

const rowTriggers = (state: ReturnType<typeof createEditorState>) => get(state.rows).map((row) => row.trigger)

const holdWrites = () => {
  let release = () => {}
  writeGate.held = new Promise<void>((resolve) => {
    release = () => resolve()
  })
  return release
}

describe('createEditorState', () => {
  let basePath = ''
  let notesPath = ''

  beforeEach(async () => {
    vi.clearAllMocks()
    settings.matchFolder = null
    settings.lastSelectedFile = null
    settings.skipPackageWarning = false
    writeGate.held = null
    findDefaultMatchDirMock.mockResolvedValue(null)
    vi.spyOn(console, 'info').mockImplementation(() => undefined)
    vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    root = await mkdtemp(join(tmpdir(), 'ezpanso-state-'))
    basePath = await put('base.yml', BASE_YAML)
    notesPath = await put('notes.yml', NOTES_YAML)
  })

  afterEach(async () => {
    vi.restoreAllMocks()
    await rm(root, { recursive: true, force: true })
  })

  describe('startup', () => {
    it('loads the stored folder and selects the first file', async () => {
      settings.matchFolder = root
      const state = createEditorState()

      expect(await state.init()).toBe(true)

      expect(get(state.fileOptions).map((option) => option.label)).toEqual(['base', 'notes'])
      expect(get(state.activePath)).toBe(basePath)
      expect(rowTriggers(state)).toEqual([':bye', ':hi'])
      expect(get(state.status)).toMatch(/^File: base \(2 snippets\) \| Modified: /)
      expect(settings.lastSelectedFile).toBe(basePath)
    })

    it('reopens the last selected file', async () => {
      settings.matchFolder = root
      settings.lastSelectedFile = notesPath
      const state = createEditorState()

      await state.init()

      expect(get(state.activePath)).toBe(notesPath)
    })

    it('falls back to the detected Espanso folder', async () => {
      findDefaultMatchDirMock.mockResolvedValue(root)
      const state = createEditorState()

      expect(await state.init()).toBe(true)
      expect(get(state.rootDir)).toBe(root)
    })

    it('asks for a folder when none is found', async () => {
      const state = createEditorState()

      expect(await state.init()).toBe(false)
      const message = 'Espanso match folder not found. Use File > Open Folder to select one.'
      expect(get(state.status)).toBe(message)
      expect(showToastMock).toHaveBeenCalledWith(message, 5000)
    })

    it('reports files that failed to load', async () => {
      await put('broken.yml', '- just\n- a list\n')
      const state = createEditorState()

      await state.load(root)

      expect(showErrorToastMock).toHaveBeenCalledWith(
        'Some files could not be loaded:\nbroken.yml: Top-level content is not a mapping',
      )
      expect(get(state.fileOptions)).toHaveLength(2)
    })
  })

  describe('openDirectory', () => {
    it('rejects a folder that does not exist', async () => {
      const state = createEditorState()

      expect(await state.openDirectory(join(root, 'missing'))).toBe(false)
      expect(get(state.status)).toBe('Espanso directory not set or invalid.')
      expect(settings.matchFolder).toBeNull()
    })

    it('remembers a folder that loads', async () => {
      const state = createEditorState()

      expect(await state.openDirectory(root)).toBe(true)
      expect(settings.matchFolder).toBe(root)
    })
  })

  describe('editing', () => {
    it('saves an edit and reads it back after a refresh', async () => {
      const state = createEditorState()
      await state.load(root)

      expect(state.editCell({ displayTrigger: ':bye', field: 'replace', value: 'See you' }).status).toBe('applied')
      expect(get(state.title)).toBe('EZpanso *')

      expect(state.requestSave()).toBe(true)
      expect(get(state.dialogs.saveConfirm.state).message).toBe(
        'Save changes to 1 file(s)? This will overwrite the existing files.',
      )
      const summary = await state.dialogs.saveConfirm.confirm()

      expect(summary).toEqual({ saved: [basePath], failed: [] })
      expect(get(state.title)).toBe('EZpanso')

      expect(await state.refresh()).toBe(true)
      expect(get(state.activePath)).toBe(basePath)
      expect(get(state.rows).find((row) => row.trigger === ':bye')?.replace).toBe('See you')
      expect(get(state.canUndo)).toBe(false)
      expect(await readFile(basePath, 'utf8')).toContain('See you')
    })

    it('shows rejected edits as an error toast', async () => {
      const state = createEditorState()
      await state.load(root)

      const outcome = state.editCell({ displayTrigger: ':bye', field: 'trigger', value: ':hi' })

      expect(outcome.status).toBe('rejected')
      expect(showErrorToastMock).toHaveBeenCalledWith("Trigger ':hi' already exists in this file.")
    })

    it('describes undo and redo in the status line', async () => {
      const state = createEditorState()
      await state.load(root)
      state.editCell({ displayTrigger: ':bye', field: 'replace', value: 'See you' })

      state.undo()
      expect(get(state.status)).toBe("Undo: Edit replace of ':bye'")
      expect(get(state.modified)).toBe(false)

      state.undo()
      expect(get(state.status)).toBe('Nothing to undo.')

      state.redo()
      expect(get(state.status)).toBe("Redo: Edit replace of ':bye'")
      expect(get(state.modified)).toBe(true)
    })

    it('adds a snippet through the dialog', async () => {
      const state = createEditorState()
      await state.load(root)

      expect(state.openAddMatch()).toBe(true)
      const match = state.dialogs.addMatch.confirm(':addr', '1 Main St')

      expect(match?.trigger).toBe(':addr')
      expect(get(state.status)).toBe("Added snippet ':addr'.")
      expect(rowTriggers(state)).toEqual([':addr', ':bye', ':hi'])
    })

    it('deletes the selected rows after confirmation', async () => {
      const state = createEditorState()
      await state.load(root)
      state.setSelection([':hi'])

      await state.runCommand('delete')
      expect(get(state.dialogs.deleteConfirm.state).message).toBe(
        'Remove 1 snippet(s) from base? This is permanent upon saving.',
      )

      expect(state.dialogs.deleteConfirm.confirm()).toBe(1)
      expect(rowTriggers(state)).toEqual([':bye'])
      expect(get(state.selection)).toEqual([])
    })
  })

  describe('unsaved changes', () => {
    it('keeps the edits when a refresh is cancelled', async () => {
      const state = createEditorState()
      await state.load(root)
      state.editCell({ displayTrigger: ':bye', field: 'replace', value: 'See you' })

      const pending = state.refresh()
      expect(get(state.dialogs.unsavedChanges.state).reason).toBe('refresh')
      await state.dialogs.unsavedChanges.choose('cancel')

      expect(await pending).toBe(false)
      expect(get(state.rows).find((row) => row.trigger === ':bye')?.replace).toBe('See you')
    })

    it('drops the edits when they are discarded', async () => {
      const state = createEditorState()
      await state.load(root)
      state.editCell({ displayTrigger: ':bye', field: 'replace', value: 'See you' })

      const pending = state.refresh()
      await state.dialogs.unsavedChanges.choose('discard')

      expect(await pending).toBe(true)
      expect(get(state.rows).find((row) => row.trigger === ':bye')?.replace).toBe('Goodbye')
      expect(get(state.modified)).toBe(false)
    })
  })

  describe('save in flight', () => {
    const MSG_SAVE_RUNNING = 'A save is still running. Try again when it finishes.'

    it('keeps a pending save when a refresh asks to save again', async () => {
      const state = createEditorState()
      await state.load(root)
      state.editCell({ displayTrigger: ':hi', field: 'replace', value: 'Hey' })
      const release = holdWrites()
      state.requestSave()
      const saving = state.dialogs.saveConfirm.confirm()

      const refreshing = state.refresh()
      expect(get(state.dialogs.unsavedChanges.state).reason).toBe('refresh')
      await state.dialogs.unsavedChanges.choose('save')

      expect(await refreshing).toBe(false)
      expect(showToastMock).toHaveBeenCalledWith(MSG_SAVE_RUNNING)

      release()
      expect(await saving).toEqual({ saved: [basePath], failed: [] })
      expect(get(state.rows).find((row) => row.trigger === ':hi')?.replace).toBe('Hey')
      expect(get(state.modified)).toBe(false)
      expect(parse(await readFile(basePath, 'utf8')).matches[0]).toEqual({ trigger: ':hi', replace: 'Hey' })
    })

    it('does not reload the folder until the write finishes', async () => {
      const state = createEditorState()
      await state.load(root)
      state.editCell({ displayTrigger: ':hi', field: 'replace', value: 'Hey' })
      const release = holdWrites()
      state.requestSave()
      const saving = state.dialogs.saveConfirm.confirm()

      const opening = state.openDirectory(root)
      await state.dialogs.unsavedChanges.choose('discard')

      expect(await opening).toBe(false)
      expect(get(state.status)).toBe(MSG_SAVE_RUNNING)
      expect(settings.matchFolder).toBeNull()

      release()
      await saving
      expect(get(state.rows).find((row) => row.trigger === ':hi')?.replace).toBe('Hey')
      expect(await state.refresh()).toBe(true)
      expect(get(state.rows).find((row) => row.trigger === ':hi')?.replace).toBe('Hey')
    })

    it('keeps the window open when a quit asks to save again', async () => {
      const state = createEditorState()
      await state.load(root)
      state.editCell({ displayTrigger: ':hi', field: 'replace', value: 'Hey' })
      const release = holdWrites()
      state.requestSave()
      const saving = state.dialogs.saveConfirm.confirm()

      const closing = state.requestClose()
      await state.dialogs.unsavedChanges.choose('save')

      expect(await closing).toBe(false)
      release()
      await saving
      expect(await state.requestClose()).toBe(true)
    })
  })

  describe('files', () => {
    it('creates a file and selects it', async () => {
      const state = createEditorState()
      await state.load(root)

      state.dialogs.newFile.open()
      const path = await state.dialogs.newFile.confirm('work')

      expect(path).toBe(join(root, 'work.yml'))
      expect(get(state.activePath)).toBe(path)
      expect(get(state.fileOptions).map((option) => option.label)).toEqual(['base', 'notes', 'work'])
      expect(showToastMock).toHaveBeenCalledWith("File 'work.yml' created.")
      expect(await pathExists(join(root, 'work.yml'))).toBe(true)
    })

    it('deletes the active file and its history', async () => {
      const state = createEditorState()
      await state.load(root)
      await state.selectFile(notesPath)
      state.editCell({ displayTrigger: ':sig', field: 'replace', value: 'Cheers' })

      expect(state.requestDeleteFile()).toBe(true)
      expect(await state.dialogs.deleteFile.confirm()).toBe(true)

      expect(get(state.fileOptions).map((option) => option.label)).toEqual(['base'])
      expect(get(state.activePath)).toBe(basePath)
      expect(get(state.canUndo)).toBe(false)
      expect(get(state.modified)).toBe(false)
      expect(await pathExists(notesPath)).toBe(false)
    })

    it('warns once about package files', async () => {
      const packagePath = await put('packages/greek/package.yml', 'matches:\n  - trigger: ":a"\n    replace: "a"\n')
      const state = createEditorState()
      await state.load(root)

      await state.selectFile(packagePath)
      expect(get(state.dialogs.packageWarning.state).open).toBe(true)

      await state.dialogs.packageWarning.dismiss(true)
      expect(settings.skipPackageWarning).toBe(true)
    })
  })

  describe('shortcuts', () => {
    it('blocks commands while a dialog is open, except cancel', async () => {
      const state = createEditorState()
      await state.load(root)

      expect(state.resolveShortcut(keyInput('s', true))).toBe('save')

      state.openAddMatch()
      expect(state.resolveShortcut(keyInput('s', true))).toBeNull()
      expect(state.resolveShortcut(keyInput('Escape'))).toBe('cancel')

      await state.runCommand('cancel')
      expect(get(state.anyModalOpen)).toBe(false)
      expect(get(state.dialogs.addMatch.state).open).toBe(false)
    })

    it('clears the filter on cancel without a dialog', async () => {
      const state = createEditorState()
      await state.load(root)
      state.setFilter('bye')

      await state.runCommand('cancel')

      expect(get(state.filter)).toBe('')
    })

    it('asks the view to focus the filter on find', async () => {
      const onFind = vi.fn()
      const state = createEditorState({ onFind })

      await state.runCommand('find')

      expect(onFind).toHaveBeenCalledTimes(1)
    })
  })
})
