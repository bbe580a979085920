import { get, writable } from 'svelte/store'
import type { ModalOpenState } from '@/ui/modalOpenState'
import { MSG_PACKAGE_WARNING } from '../messages'
import { isPackageFile } from '../model/displayName'

type Deps = {
  loadSkipPackageWarning: () => Promise<boolean>
  storeSkipPackageWarning: (value: boolean) => Promise<void>
  modals: ModalOpenState
}

export type PackageWarningState = {
  open: boolean
  path: string | null
  message: string
}

export const createPackageWarningModal = (deps: Deps) => {
  const { loadSkipPackageWarning, storeSkipPackageWarning, modals } = deps
  const state = writable<PackageWarningState>({ open: false, path: null, message: '' })
  let skip: boolean | null = null

  /** Opens the warning when a package file is selected, unless the user opted out. */
  const maybeOpen = async (path: string) => {
    if (!isPackageFile(path) || get(state).open) return false
    if (skip === null) {
      skip = await loadSkipPackageWarning()
    }
    if (skip) return false
    modals.enter()
    state.set({ open: true, path, message: MSG_PACKAGE_WARNING })
    return true
  }

  const dismiss = async (dontShowAgain = false) => {
    if (!get(state).open) return
    modals.leave()
    state.set({ open: false, path: null, message: '' })
    if (dontShowAgain) {
      skip = true
      await storeSkipPackageWarning(true)
    }
  }

  return {
    state,
    maybeOpen,
    dismiss,
  }
}
