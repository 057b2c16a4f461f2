/* -------------------------------------------------------------------------- */
/*  LidSwitchService                                                          */
/*                                                                            */
/*  Responsibilities:                                                         */
/*  - Own the single authoritative lid sensor state                           */
/*  - Reconcile raw reads + notifications into SW_LID-style switch reports    */
/*  - Apply the process-wide initial-state policy on open/resume              */
/*  - Emit domain events for logging + AppState adapters                      */
/*                                                                            */
/*  Non-responsibilities:                                                     */
/*  - No discovery, no transport                                              */
/*  - No AppState mutation                                                    */
/*  - No HTTP handling                                                        */
/* -------------------------------------------------------------------------- */

export type LidState = 'open' | 'closed'

export type LidStatus = LidState | 'unsupported'

/**
 * Initial-state policy, by its configuration literal.
 *
 * - `ignore`   no synthetic initial report; repeated values are debounced and
 *              stuck "closed" streams get an "open" complement pulse
 * - `open`     assume the lid is open at open/resume, without a raw read
 * - `method`   trust the platform's own lid state query
 * - `disabled` the sensor must never be bound
 */
export type LidInitPolicy = 'ignore' | 'open' | 'method' | 'disabled'

export const LID_INIT_POLICIES: readonly LidInitPolicy[] = ['ignore', 'open', 'method', 'disabled']

/** Status-change notification code delivered by firmware. */
export const LID_NOTIFY_STATUS = 0x80

export const DEFAULT_REPORT_INTERVAL_MS = 500

/* -------------------------------------------------------------------------- */
/*  Identity + quirks                                                          */
/* -------------------------------------------------------------------------- */

export interface SystemIdentity {
  sysVendor: string
  productName: string
  biosVersion: string
}

export interface LidQuirk {
  /** Human-readable reason the machine needs an override. */
  label: string
  /** Omitted fields match anything. */
  matches: Partial<SystemIdentity>
  policy: LidInitPolicy
}

/* -------------------------------------------------------------------------- */
/*  Errors (values, never thrown across the service boundary)                  */
/* -------------------------------------------------------------------------- */

export type LidError =
  | { kind: 'sensor-unavailable'; message: string; detail?: string }
  | { kind: 'invalid-policy-name'; message: string; value: string }
  | { kind: 'policy-locked'; message: string; policy: LidInitPolicy }
  | { kind: 'duplicate-sensor'; message: string }
  | { kind: 'sensor-disabled'; message: string }
  | { kind: 'invalid-report-interval'; message: string; value: unknown }

export type SensorError = Extract<LidError, { kind: 'sensor-unavailable' }>
export type PolicyError = Extract<LidError, { kind: 'invalid-policy-name' | 'policy-locked' }>
export type BindError = Extract<LidError, { kind: 'duplicate-sensor' | 'sensor-disabled' }>

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E }

export type SensorReadResult = Result<LidState, SensorError>

/* -------------------------------------------------------------------------- */
/*  Platform collaborators                                                     */
/* -------------------------------------------------------------------------- */

export interface LidPlatform {
  /** The platform's own lid state query. */
  queryLid(): Promise<SensorReadResult>
  /** Wake indication for an observed closed -> open transition. */
  signalWakeup(): void
}

/* -------------------------------------------------------------------------- */
/*  Engine state                                                               */
/* -------------------------------------------------------------------------- */

export interface LidSnapshot {
  lastReportedState: LidState
  /** Monotonic ms; always written together with lastReportedState. */
  lastReportedAt: number
}

export interface LidSensorState extends LidSnapshot {
  initialized: boolean
  suspended: boolean
}

export interface LidReport {
  state: LidState
  /** True for the complement pulse injected ahead of a stuck "closed". */
  synthetic: boolean
}

export interface LidSwitchConfig {
  policy: LidInitPolicy
  reportIntervalMs: number
}

/* -------------------------------------------------------------------------- */
/*  Service -> plugin observability events                                     */
/* -------------------------------------------------------------------------- */

export interface LidSwitchEventSink {
  publish(evt: LidSwitchEvent): void
}

export type LidSwitchEvent =
  | {
      kind: 'lid-switch-reported'
      at: number
      state: LidState
      synthetic: boolean
    }
  | {
      kind: 'lid-initialized'
      at: number
      policy: LidInitPolicy
      trigger: 'open' | 'initialize' | 'resume'
    }
  | {
      kind: 'lid-firmware-noncompliant'
      at: number
      observed: LidState
      sinceLastMs: number
    }
  | {
      kind: 'lid-notification-dropped'
      at: number
      event: number
      reason: 'not-initialized' | 'unsupported-event'
    }
  | {
      kind: 'lid-wakeup-signalled'
      at: number
    }
  | {
      kind: 'lid-suspended'
      at: number
    }
  | {
      kind: 'lid-resumed'
      at: number
      state: LidState | null
    }
  | {
      kind: 'lid-unbound'
      at: number
    }
  | {
      kind: 'lid-report-interval-changed'
      at: number
      reportIntervalMs: number
    }
  | {
      kind: 'recoverable-error'
      at: number
      error: LidError
    }

/* -------------------------------------------------------------------------- */
/*  AppState slice shape (adapter writes this into core/state.ts)              */
/* -------------------------------------------------------------------------- */

export interface LidSwitchStateSlice {
  bound: boolean
  policy: LidInitPolicy | null
  reportIntervalMs: number

  switchState: LidState | null
  lastReportAt: number | null
  reports: number
  syntheticReports: number

  initialized: boolean
  suspended: boolean
  firmwareNonCompliant: boolean
  wakeups: number

  lastError: LidError | null

  updatedAt: number
}
