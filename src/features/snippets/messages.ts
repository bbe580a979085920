export const APP_TITLE = 'EZpanso'

export const MSG_READY = 'Ready'
export const MSG_LOADING_FILES = 'Loading files...'
export const MSG_PICK_FOLDER = 'Espanso match folder not found. Use File > Open Folder to select one.'
export const MSG_INVALID_FOLDER = 'Espanso directory not set or invalid.'
export const MSG_NO_FILE_SELECTED = 'No file selected.'
export const MSG_NO_CHANGES = 'No changes to save.'
export const MSG_SAVING = 'Saving files...'
export const MSG_LOAD_IN_PROGRESS = 'Files are still loading. Try again when they finish.'
export const MSG_SAVE_IN_PROGRESS = 'A save is still running. Try again when it finishes.'
export const MSG_NOTHING_TO_UNDO = 'Nothing to undo.'
export const MSG_NOTHING_TO_REDO = 'Nothing to redo.'
export const MSG_CANNOT_EDIT_COMPLEX =
  'This snippet has a complex YAML structure and cannot be edited in place.'
export const MSG_PACKAGE_WARNING =
  'This file belongs to an installed package. Changes may be lost when the package is updated.'

export const ERROR_TRIGGER_EMPTY = 'Trigger cannot be empty.'
export const ERROR_NO_FILE_TO_ADD = 'No file selected to add snippet to.'
export const ERROR_FILE_NAME_EMPTY = 'File name cannot be empty.'
export const ERROR_FILE_NAME_INVALID_CHARS = 'File name contains invalid characters.'
export const ERROR_FILE_NO_EXTENSION = 'Do not include .yml or .yaml extension; it will be added.'
export const ERROR_FILE_NAME_UNDERSCORE = "File names starting with '_' are ignored by Espanso and the editor."

export const loadedCount = (snippets: number, files: number) =>
  `Loaded ${snippets} snippets from ${files} files.`

export const noYamlFiles = (root: string) => `No YAML files found in ${root}.`

export const fileStatus = (name: string, snippets: number, modified: Date | null) =>
  modified
    ? `File: ${name} (${snippets} snippets) | Modified: ${modified.toLocaleString()}`
    : `File: ${name} (${snippets} snippets) | Modified: Unknown`

export const triggerExists = (trigger: string) => `Trigger '${trigger}' already exists in this file.`

export const fileExists = (name: string) => `A file '${name}' already exists.`

export const confirmSave = (count: number) =>
  `Save changes to ${count} file(s)? This will overwrite the existing files.`

export const confirmRemoveSnippets = (count: number, fileName: string) =>
  `Remove ${count} snippet(s) from ${fileName}? This is permanent upon saving.`

export const confirmDeleteFile = (fileName: string) =>
  `Permanently delete the file '${fileName}' and all its snippets?`

export const savedCount = (count: number) => `Saved ${count} file(s).`

export const saveFailed = (lines: string[]) => `Some files failed to save:\n${lines.join('\n')}`

export const loadWarnings = (lines: string[]) => `Some files could not be loaded:\n${lines.join('\n')}`

export const undone = (description: string) => `Undo: ${description}`

export const redone = (description: string) => `Redo: ${description}`

export const snippetAdded = (trigger: string) => `Added snippet '${trigger}'.`

export const fileCreated = (name: string) => `File '${name}' created.`
