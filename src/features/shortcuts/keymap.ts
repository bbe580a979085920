export type ShortcutCommandId =
  | 'add'
  | 'new_file'
  | 'save'
  | 'refresh'
  | 'delete'
  | 'delete_file'
  | 'undo'
  | 'redo'
  | 'find'
  | 'cancel'

export type ShortcutBinding = {
  commandId: ShortcutCommandId
  label: string
  accelerator: string
}

/** The subset of a DOM KeyboardEvent the matcher reads. */
export type KeyInput = {
  key: string
  ctrlKey: boolean
  metaKey: boolean
  altKey: boolean
  shiftKey: boolean
}

type ParsedAccelerator = {
  ctrl: boolean
  alt: boolean
  shift: boolean
  key: string
}

export const DEFAULT_SHORTCUTS: ShortcutBinding[] = [
  { commandId: 'add', label: 'New snippet', accelerator: 'Ctrl+N' },
  { commandId: 'new_file', label: 'New file', accelerator: 'Ctrl+Shift+N' },
  { commandId: 'save', label: 'Save all changes', accelerator: 'Ctrl+S' },
  { commandId: 'refresh', label: 'Refresh', accelerator: 'F5' },
  { commandId: 'delete', label: 'Delete snippet', accelerator: 'Delete' },
  { commandId: 'delete_file', label: 'Delete file', accelerator: 'Shift+Delete' },
  { commandId: 'undo', label: 'Undo', accelerator: 'Ctrl+Z' },
  { commandId: 'redo', label: 'Redo', accelerator: 'Ctrl+Y' },
  { commandId: 'redo', label: 'Redo', accelerator: 'Ctrl+Shift+Z' },
  { commandId: 'find', label: 'Find', accelerator: 'Ctrl+F' },
  { commandId: 'cancel', label: 'Cancel', accelerator: 'Escape' },
]

const normalizeKeyToken = (token: string): string | null => {
  const lowered = token.trim().toLowerCase()
  if (!lowered) return null
  if (lowered.length === 1 && /^[a-z0-9]$/.test(lowered)) return lowered
  if (/^f([1-9]|1[0-2])$/.test(lowered)) return lowered
  switch (lowered) {
    case 'esc':
    case 'escape':
      return 'escape'
    case 'enter':
    case 'return':
      return 'enter'
    case 'backspace':
      return 'backspace'
    case 'delete':
    case 'del':
      return 'delete'
    default:
      return null
  }
}

const parseAccelerator = (accelerator: string): ParsedAccelerator | null => {
  let ctrl = false
  let alt = false
  let shift = false
  let key: string | null = null

  const parts = accelerator.split('+').map((part) => part.trim()).filter(Boolean)
  if (parts.length === 0) return null

  for (const part of parts) {
    const lowered = part.toLowerCase()
    if (lowered === 'ctrl' || lowered === 'control' || lowered === 'cmd' || lowered === 'command' || lowered === 'meta') {
      ctrl = true
      continue
    }
    if (lowered === 'alt' || lowered === 'option') {
      alt = true
      continue
    }
    if (lowered === 'shift') {
      shift = true
      continue
    }
    if (key) return null
    key = normalizeKeyToken(part)
    if (!key) return null
  }

  if (!key) return null
  return { ctrl, alt, shift, key }
}

// Cmd on macOS counts as Ctrl.
export const eventMatchesAccelerator = (event: KeyInput, accelerator: string): boolean => {
  const parsed = parseAccelerator(accelerator)
  if (!parsed) return false
  const key = normalizeKeyToken(event.key)
  if (!key) return false
  return (
    parsed.ctrl === (event.ctrlKey || event.metaKey) &&
    parsed.alt === event.altKey &&
    parsed.shift === event.shiftKey &&
    parsed.key === key
  )
}

export const matchCommand = (
  event: KeyInput,
  shortcuts: readonly ShortcutBinding[] = DEFAULT_SHORTCUTS,
): ShortcutCommandId | null =>
  shortcuts.find((shortcut) => eventMatchesAccelerator(event, shortcut.accelerator))?.commandId ?? null

export const shortcutFor = (
  commandId: ShortcutCommandId,
  shortcuts: readonly ShortcutBinding[] = DEFAULT_SHORTCUTS,
): ShortcutBinding | null => shortcuts.find((shortcut) => shortcut.commandId === commandId) ?? null
