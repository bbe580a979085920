import { derived, get, writable } from 'svelte/store'

export const createModalOpenState = () => {
  const openModalCount = writable(0)
  const anyModalOpen = derived(openModalCount, (count) => count > 0)

  return {
    anyModalOpen,
    enter: () => openModalCount.update((count) => count + 1),
    leave: () => openModalCount.update((count) => Math.max(0, count - 1)),
    isOpen: () => get(anyModalOpen),
  }
}

export type ModalOpenState = ReturnType<typeof createModalOpenState>
