import { writable } from 'svelte/store'

export type ToastMessage = {
  message: string
  tone: 'info' | 'error'
}

const toastStore = writable<ToastMessage | null>(null)
let timer: ReturnType<typeof setTimeout> | null = null

export const showToast = (message: string, durationMs = 2500, tone: ToastMessage['tone'] = 'info') => {
  toastStore.set({ message, tone })
  if (timer) {
    clearTimeout(timer)
  }
  timer = setTimeout(() => {
    toastStore.set(null)
    timer = null
  }, durationMs)
}

export const showErrorToast = (message: string, durationMs = 5000) => showToast(message, durationMs, 'error')

export const dismissToast = () => {
  if (timer) {
    clearTimeout(timer)
    timer = null
  }
  toastStore.set(null)
}

export const toast = { subscribe: toastStore.subscribe }
