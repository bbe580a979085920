import { get, writable } from 'svelte/store'
import type { ModalOpenState } from '@/ui/modalOpenState'
import { MSG_PICK_FOLDER } from '../messages'
import type { CreateFileResult } from '../services/yaml.service'

type Deps = {
  createFile: (name: string) => Promise<CreateFileResult>
  hasRoot: () => boolean
  modals: ModalOpenState
  showToast: (msg: string) => void
}

export type NewFileModalState = {
  open: boolean
  error: string
}

export const createNewFileModal = (deps: Deps) => {
  const { createFile, hasRoot, modals, showToast } = deps
  const state = writable<NewFileModalState>({ open: false, error: '' })
  let busy = false

  const open = () => {
    if (get(state).open) return false
    if (!hasRoot()) {
      showToast(MSG_PICK_FOLDER)
      return false
    }
    modals.enter()
    state.set({ open: true, error: '' })
    return true
  }

  const close = () => {
    if (!get(state).open) return
    modals.leave()
    state.set({ open: false, error: '' })
  }

  const confirm = async (name: string): Promise<string | null> => {
    if (!get(state).open || busy) return null
    busy = true
    try {
      const result = await createFile(name)
      if (!result.ok) {
        state.update((s) => ({ ...s, error: result.error }))
        return null
      }
      close()
      return result.path
    } finally {
      busy = false
    }
  }

  return {
    state,
    open,
    close,
    confirm,
  }
}
