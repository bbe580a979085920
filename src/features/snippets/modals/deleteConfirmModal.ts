import { get, writable } from 'svelte/store'
import type { ModalOpenState } from '@/ui/modalOpenState'
import { confirmRemoveSnippets } from '../messages'

type Deps = {
  deleteMatches: (displayTriggers: readonly string[]) => number
  activeFileName: () => string | null
  modals: ModalOpenState
  showToast: (msg: string) => void
}

export type DeleteConfirmState = {
  open: boolean
  targets: string[]
  message: string
}

const closedState = (): DeleteConfirmState => ({ open: false, targets: [], message: '' })

export const createDeleteConfirmModal = (deps: Deps) => {
  const { deleteMatches, activeFileName, modals, showToast } = deps
  const state = writable<DeleteConfirmState>(closedState())

  /** Targets are the triggers as displayed in the selected rows. */
  const open = (displayTriggers: readonly string[]) => {
    const fileName = activeFileName()
    if (displayTriggers.length === 0 || !fileName || get(state).open) return false
    modals.enter()
    state.set({
      open: true,
      targets: [...displayTriggers],
      message: confirmRemoveSnippets(displayTriggers.length, fileName),
    })
    return true
  }

  const close = () => {
    if (!get(state).open) return
    modals.leave()
    state.set(closedState())
  }

  const confirm = () => {
    const current = get(state)
    if (!current.open) return 0
    const removed = deleteMatches(current.targets)
    close()
    if (removed > 0) {
      showToast(`Removed ${removed} snippet(s)`)
    }
    return removed
  }

  return {
    state,
    open,
    close,
    confirm,
  }
}
