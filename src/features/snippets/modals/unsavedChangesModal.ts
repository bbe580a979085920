import { get, writable } from 'svelte/store'
import type { ModalOpenState } from '@/ui/modalOpenState'
import type { SaveSummary } from '../model/types'

export type UnsavedReason = 'quit' | 'refresh' | 'open-folder'
export type UnsavedChoice = 'save' | 'discard' | 'cancel'

type Deps = {
  hasUnsavedChanges: () => boolean
  saveAll: () => Promise<SaveSummary | null>
  modals: ModalOpenState
}

export type UnsavedChangesState = {
  open: boolean
  reason: UnsavedReason | null
  message: string
}

const MESSAGES: Record<UnsavedReason, string> = {
  quit: 'You have unsaved changes. Save them before closing?',
  refresh: 'You have unsaved changes. Save them before reloading the folder?',
  'open-folder': 'You have unsaved changes. Save them before opening another folder?',
}

export const createUnsavedChangesModal = (deps: Deps) => {
  const { hasUnsavedChanges, saveAll, modals } = deps
  const state = writable<UnsavedChangesState>({ open: false, reason: null, message: '' })
  let resolver: ((proceed: boolean) => void) | null = null

  /** Resolves true when the caller may go ahead and drop the in-memory state. */
  const request = (reason: UnsavedReason): Promise<boolean> => {
    if (!hasUnsavedChanges()) return Promise.resolve(true)
    if (get(state).open) return Promise.resolve(false)
    modals.enter()
    state.set({ open: true, reason, message: MESSAGES[reason] })
    return new Promise<boolean>((resolve) => {
      resolver = resolve
    })
  }

  const choose = async (choice: UnsavedChoice) => {
    const resolve = resolver
    if (!resolve) return
    resolver = null
    modals.leave()
    state.set({ open: false, reason: null, message: '' })
    if (choice === 'cancel') {
      resolve(false)
      return
    }
    if (choice === 'discard') {
      resolve(true)
      return
    }
    // A save refused because another one is running wrote nothing.
    const summary = await saveAll()
    resolve(summary !== null && summary.failed.length === 0)
  }

  return {
    state,
    request,
    choose,
  }
}
