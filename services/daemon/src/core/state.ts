// services/daemon/src/core/state.ts
import type { LidSwitchStateSlice } from '../devices/lid-switch/types.js'
import type { ButtonKind, ButtonStateSlice } from '../devices/button/types.js'
import { DEFAULT_REPORT_INTERVAL_MS } from '../devices/lid-switch/types.js'

/* -------------------------------------------------------------------------- */
/*  Hardware error + hotkey snapshots                                         */
/* -------------------------------------------------------------------------- */

export type HardwareErrorSnapshot = {
    deviceId: string | null
    notifications: number
    lastNotifiedAt: number | null
    listeners: number
}

export type HotkeySnapshot = {
    taps: number
    lastTapAt: number | null
    unknownEvents: number
}

export type TinyPowerButtonSnapshot = {
    enabled: boolean
    signal: string | number | null
    pid: number | null
    sent: number
    failed: number
    lastSentAt: number | null
}

/* -------------------------------------------------------------------------- */
/*  Full AppState                                                             */
/* -------------------------------------------------------------------------- */

export type AppState = {
    version: number
    meta: { startedAt: string; status: 'booting' | 'ready' | 'error' }
    power: { suspended: boolean; changedAt: number | null }
    lidSwitch: LidSwitchStateSlice
    buttons: Record<ButtonKind, ButtonStateSlice>
    hardwareError: HardwareErrorSnapshot
    hotkey: HotkeySnapshot
    tinyPowerButton: TinyPowerButtonSnapshot
}

const startedAt = new Date().toISOString()

/* -------------------------------------------------------------------------- */
/*  Initial slices                                                            */
/* -------------------------------------------------------------------------- */

export function initialLidSwitchSlice(): LidSwitchStateSlice {
    return {
        bound: false,
        policy: null,
        reportIntervalMs: DEFAULT_REPORT_INTERVAL_MS,

        switchState: null,
        lastReportAt: null,
        reports: 0,
        syntheticReports: 0,

        initialized: false,
        suspended: false,
        firmwareNonCompliant: false,
        wakeups: 0,

        lastError: null,

        updatedAt: Date.now(),
    }
}

export function initialButtonSlice(): ButtonStateSlice {
    return {
        suspended: false,
        pushed: 0,
        lastPressAt: null,
        suppressed: 0,
        updatedAt: Date.now(),
    }
}

let state: AppState = {
    version: 1,
    meta: { startedAt, status: 'booting' },
    power: { suspended: false, changedAt: null },
    lidSwitch: initialLidSwitchSlice(),
    buttons: {
        power: initialButtonSlice(),
        sleep: initialButtonSlice(),
    },
    hardwareError: { deviceId: null, notifications: 0, lastNotifiedAt: null, listeners: 0 },
    hotkey: { taps: 0, lastTapAt: null, unknownEvents: 0 },
    tinyPowerButton: { enabled: false, signal: null, pid: null, sent: 0, failed: 0, lastSentAt: null },
}

function clone<T>(v: T): T {
    return structuredClone(v)
}

/* -------------------------------------------------------------------------- */
/*  Public state update wrappers                                              */
/* -------------------------------------------------------------------------- */

export function getSnapshot(): AppState {
    return clone(state)
}

export function set<K extends Exclude<keyof AppState, 'version'>>(key: K, value: AppState[K]) {
    state = {
        ...state,
        [key]: clone(value),
        version: state.version + 1,
    }
}

export function setStatus(status: AppState['meta']['status']) {
    set('meta', { ...state.meta, status })
}

export function setPowerSuspended(suspended: boolean, changedAt: number = Date.now()) {
    set('power', { suspended, changedAt })
}

export function updateLidSwitchSnapshot(next: LidSwitchStateSlice) {
    set('lidSwitch', next)
}

export function updateButtonSnapshot(kind: ButtonKind, next: ButtonStateSlice) {
    set('buttons', { ...state.buttons, [kind]: next })
}

export function updateHardwareErrorSnapshot(partial: Partial<HardwareErrorSnapshot>) {
    set('hardwareError', { ...state.hardwareError, ...partial })
}

export function updateHotkeySnapshot(partial: Partial<HotkeySnapshot>) {
    set('hotkey', { ...state.hotkey, ...partial })
}

export function updateTinyPowerButtonSnapshot(partial: Partial<TinyPowerButtonSnapshot>) {
    set('tinyPowerButton', { ...state.tinyPowerButton, ...partial })
}
