export { createEditorState } from './state'
export type { EditorState } from './state'
export { showToast, showErrorToast, dismissToast, toast } from './hooks/useToast'
export type { ToastMessage } from './hooks/useToast'
export { loadDirectory, saveFile, createFile, deleteFile, validateFileName } from './services/yaml.service'
export { findDefaultMatchDir } from './services/espansoPaths'
export { isComplex, toDisplay, fromDisplay, previewText } from './model/match'
export type {
  DisplayRow,
  EditField,
  EditOutcome,
  FileEntry,
  Match,
  SaveSummary,
  Snapshot,
} from './model/types'
export type { CellEdit } from './state/tableSlice'
export type { WindowGeometry } from './services/settings.service'
