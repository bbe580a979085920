import { get } from 'svelte/store'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createModalOpenState } from '@/ui/modalOpenState'
import type { SaveSummary } from '../model/types'
import { createUnsavedChangesModal } from './unsavedChangesModal'

const hasUnsavedMock = vi.fn<() => boolean>()
const saveAllMock = vi.fn<() => Promise<SaveSummary | null>>()

const setup = () =>
  createUnsavedChangesModal({
    hasUnsavedChanges: hasUnsavedMock,
    saveAll: saveAllMock,
    modals: createModalOpenState(),
  })

describe('createUnsavedChangesModal', () => {
  beforeEach(() => {
    vi.clearAllMocks()
    hasUnsavedMock.mockReturnValue(true)
  })

  it('lets the caller go ahead when nothing is dirty', async () => {
    hasUnsavedMock.mockReturnValue(false)
    const modal = setup()

    expect(await modal.request('quit')).toBe(true)
    expect(get(modal.state).open).toBe(false)
  })

  it('holds the caller on cancel', async () => {
    const modal = setup()
    const pending = modal.request('refresh')
    expect(get(modal.state)).toEqual({
      open: true,
      reason: 'refresh',
      message: 'You have unsaved changes. Save them before reloading the folder?',
    })

    await modal.choose('cancel')

    expect(await pending).toBe(false)
    expect(get(modal.state).open).toBe(false)
  })

  it('proceeds on discard without saving', async () => {
    const modal = setup()
    const pending = modal.request('quit')

    await modal.choose('discard')

    expect(await pending).toBe(true)
    expect(saveAllMock).not.toHaveBeenCalled()
  })

  it('proceeds after a clean save only', async () => {
    saveAllMock.mockResolvedValueOnce({ saved: [], failed: [{ path: '/m/a.yml', error: 'Permission denied' }] })
    const modal = setup()
    const failed = modal.request('quit')
    await modal.choose('save')
    expect(await failed).toBe(false)

    saveAllMock.mockResolvedValueOnce({ saved: ['/m/a.yml'], failed: [] })
    const saved = modal.request('quit')
    await modal.choose('save')
    expect(await saved).toBe(true)
  })

  it('holds the caller when the save is refused', async () => {
    saveAllMock.mockResolvedValueOnce(null)
    const modal = setup()
    const pending = modal.request('refresh')

    await modal.choose('save')

    expect(await pending).toBe(false)
    expect(saveAllMock).toHaveBeenCalledTimes(1)
  })
})
