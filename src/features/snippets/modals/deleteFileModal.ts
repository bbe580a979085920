import { get, writable } from 'svelte/store'
import type { ModalOpenState } from '@/ui/modalOpenState'
import { confirmDeleteFile } from '../messages'
import type { WriteResult } from '../model/types'

type Target = {
  path: string
  displayName: string
}

type Deps = {
  deleteFile: (path: string) => Promise<WriteResult>
  modals: ModalOpenState
  showToast: (msg: string, durationMs?: number) => void
}

export type DeleteFileState = {
  open: boolean
  target: Target | null
  message: string
}

export const createDeleteFileModal = (deps: Deps) => {
  const { deleteFile, modals, showToast } = deps
  const state = writable<DeleteFileState>({ open: false, target: null, message: '' })
  let deleting = false

  const open = (target: Target | null) => {
    if (!target || get(state).open) return false
    modals.enter()
    state.set({ open: true, target, message: confirmDeleteFile(target.displayName) })
    return true
  }

  const close = () => {
    if (!get(state).open) return
    modals.leave()
    state.set({ open: false, target: null, message: '' })
  }

  const confirm = async () => {
    const current = get(state)
    if (!current.open || !current.target || deleting) return false
    deleting = true
    const { path, displayName } = current.target
    try {
      const result = await deleteFile(path)
      if (!result.ok) {
        showToast(`Failed to delete file '${displayName}': ${result.error}`, 5000)
        return false
      }
      showToast(`File '${displayName}' deleted.`)
      return true
    } finally {
      deleting = false
      close()
    }
  }

  return {
    state,
    open,
    close,
    confirm,
  }
}
