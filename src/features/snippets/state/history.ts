import { derived, get, writable } from 'svelte/store'
import type { Snapshot } from '../model/types'
import { UNDO_LIMIT } from './helpers'

const last = <T>(list: readonly T[]): T | null => (list.length > 0 ? list[list.length - 1] : null)

export const createUndoHistory = (limit = UNDO_LIMIT) => {
  const undoStack = writable<Snapshot[]>([])
  const redoStack = writable<Snapshot[]>([])

  const canUndo = derived(undoStack, ($undo) => $undo.length > 0)
  const canRedo = derived(redoStack, ($redo) => $redo.length > 0)
  const undoLabel = derived(undoStack, ($undo) => last($undo)?.description ?? null)
  const redoLabel = derived(redoStack, ($redo) => last($redo)?.description ?? null)

  const push = (stack: typeof undoStack, snapshot: Snapshot) => {
    stack.update((list) => {
      const next = [...list, snapshot]
      return next.length > limit ? next.slice(next.length - limit) : next
    })
  }

  const pop = (stack: typeof undoStack): Snapshot | null => {
    const list = get(stack)
    const top = last(list)
    if (!top) return null
    stack.set(list.slice(0, -1))
    return top
  }

  /** Called before every mutation; a new mutation invalidates redo. */
  const record = (snapshot: Snapshot) => {
    push(undoStack, snapshot)
    redoStack.set([])
  }

  const forget = (path: string) => {
    undoStack.update((list) => list.filter((snapshot) => snapshot.path !== path))
    redoStack.update((list) => list.filter((snapshot) => snapshot.path !== path))
  }

  const clear = () => {
    undoStack.set([])
    redoStack.set([])
  }

  return {
    undoStack: { subscribe: undoStack.subscribe },
    redoStack: { subscribe: redoStack.subscribe },
    canUndo,
    canRedo,
    undoLabel,
    redoLabel,
    record,
    takeUndo: () => pop(undoStack),
    takeRedo: () => pop(redoStack),
    pushUndo: (snapshot: Snapshot) => push(undoStack, snapshot),
    pushRedo: (snapshot: Snapshot) => push(redoStack, snapshot),
    forget,
    clear,
  }
}

export type UndoHistory = ReturnType<typeof createUndoHistory>
