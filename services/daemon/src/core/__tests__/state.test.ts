import { describe, expect, it } from 'vitest'
import {
  getSnapshot,
  setPowerSuspended,
  updateButtonSnapshot,
  updateHotkeySnapshot,
  initialButtonSlice,
} from '../state'

describe('app state', () => {
  it('bumps the version on every write', () => {
    const before = getSnapshot().version
    setPowerSuspended(true, 123)
    const after = getSnapshot()

    expect(after.version).toBe(before + 1)
    expect(after.power).toEqual({ suspended: true, changedAt: 123 })
  })

  it('hands out copies', () => {
    const snap = getSnapshot()
    snap.hotkey.taps = 99
    expect(getSnapshot().hotkey.taps).not.toBe(99)
  })

  it('merges partial updates', () => {
    updateHotkeySnapshot({ taps: 2 })
    updateHotkeySnapshot({ unknownEvents: 1 })
    expect(getSnapshot().hotkey).toEqual({ taps: 2, lastTapAt: null, unknownEvents: 1 })
  })

  it('replaces one button slice without touching the other', () => {
    const sleepBefore = getSnapshot().buttons.sleep
    updateButtonSnapshot('power', { ...initialButtonSlice(), pushed: 4 })

    const snap = getSnapshot()
    expect(snap.buttons.power.pushed).toBe(4)
    expect(snap.buttons.sleep).toEqual(sleepBefore)
  })
})
