import { get, writable } from 'svelte/store'
import type { ModalOpenState } from '@/ui/modalOpenState'
import type { AddOutcome, Match } from '../model/types'

type Deps = {
  addMatch: (trigger: string, replace: string) => AddOutcome
  modals: ModalOpenState
  onAdded?: (match: Match) => void
}

export type AddMatchModalState = {
  open: boolean
  error: string
}

export const createAddMatchModal = (deps: Deps) => {
  const { addMatch, modals, onAdded } = deps
  const state = writable<AddMatchModalState>({ open: false, error: '' })

  const open = () => {
    if (get(state).open) return
    modals.enter()
    state.set({ open: true, error: '' })
  }

  const close = () => {
    if (!get(state).open) return
    modals.leave()
    state.set({ open: false, error: '' })
  }

  /** Null keeps the dialog open with the rejection shown. */
  const confirm = (trigger: string, replace: string): Match | null => {
    if (!get(state).open) return null
    const outcome = addMatch(trigger, replace)
    if (!outcome.ok) {
      state.update((s) => ({ ...s, error: outcome.message }))
      return null
    }
    close()
    onAdded?.(outcome.match)
    return outcome.match
  }

  return {
    state,
    open,
    close,
    confirm,
  }
}
