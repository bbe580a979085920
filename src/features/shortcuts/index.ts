export { DEFAULT_SHORTCUTS, eventMatchesAccelerator, matchCommand, shortcutFor } from './keymap'
export type { KeyInput, ShortcutBinding, ShortcutCommandId } from './keymap'
