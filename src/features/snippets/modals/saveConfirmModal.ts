import { get, writable } from 'svelte/store'
import type { ModalOpenState } from '@/ui/modalOpenState'
import { MSG_NO_CHANGES, confirmSave } from '../messages'
import type { SaveSummary } from '../model/types'

type Deps = {
  pendingCount: () => number
  saveAll: () => Promise<SaveSummary | null>
  modals: ModalOpenState
  showToast: (msg: string) => void
}

export type SaveConfirmState = {
  open: boolean
  count: number
  message: string
}

export const createSaveConfirmModal = (deps: Deps) => {
  const { pendingCount, saveAll, modals, showToast } = deps
  const state = writable<SaveConfirmState>({ open: false, count: 0, message: '' })

  const open = () => {
    if (get(state).open) return false
    const count = pendingCount()
    if (count === 0) {
      showToast(MSG_NO_CHANGES)
      return false
    }
    modals.enter()
    state.set({ open: true, count, message: confirmSave(count) })
    return true
  }

  const close = () => {
    if (!get(state).open) return
    modals.leave()
    state.set({ open: false, count: 0, message: '' })
  }

  const confirm = async (): Promise<SaveSummary | null> => {
    if (!get(state).open) return null
    close()
    return saveAll()
  }

  return {
    state,
    open,
    close,
    confirm,
  }
}
