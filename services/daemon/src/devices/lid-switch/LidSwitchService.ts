import { Mutex } from '../../core/lock'
import { reconcileLidReport } from './reconcile'
import type {
  LidError,
  LidInitPolicy,
  LidPlatform,
  LidReport,
  LidSensorState,
  LidState,
  LidStatus,
  LidSwitchConfig,
  LidSwitchEventSink,
  Result,
  SensorReadResult,
} from './types'
import { LID_NOTIFY_STATUS } from './types'
import { isValidReportInterval, MAX_REPORT_INTERVAL_MS, now as monotonicNow } from './utils'

type InitTrigger = 'open' | 'initialize' | 'resume'

export class LidSwitchService {
  private readonly policy: LidInitPolicy
  private intervalMs: number

  private readonly platform: LidPlatform
  private readonly events: LidSwitchEventSink
  private readonly clock: () => number

  // notifyState is synchronous; the lock only spans the awaited raw reads around it.
  private readonly lock = new Mutex()

  private lastReportedState: LidState = 'closed'
  private lastReportedAt = 0
  private initialized = false
  private suspended = false

  private nonCompliantWarned = false

  constructor(
    cfg: LidSwitchConfig,
    deps: { platform: LidPlatform; events: LidSwitchEventSink; clock?: () => number }
  ) {
    this.policy = cfg.policy
    this.intervalMs = cfg.reportIntervalMs
    this.platform = deps.platform
    this.events = deps.events
    this.clock = deps.clock ?? monotonicNow
  }

  /* ---------------------------------------------------------------------- */
  /*  Introspection + tunables                                              */
  /* ---------------------------------------------------------------------- */

  public getPolicy(): LidInitPolicy {
    return this.policy
  }

  public getReportInterval(): number {
    return this.intervalMs
  }

  public setReportInterval(ms: unknown): Result<number, LidError> {
    if (!isValidReportInterval(ms)) {
      return {
        ok: false,
        error: {
          kind: 'invalid-report-interval',
          message: `report interval must be an integer between 0 and ${MAX_REPORT_INTERVAL_MS} ms`,
          value: ms,
        },
      }
    }

    this.intervalMs = ms
    this.events.publish({
      kind: 'lid-report-interval-changed',
      at: this.clock(),
      reportIntervalMs: ms,
    })
    return { ok: true, value: ms }
  }

  public getState(): LidSensorState {
    return {
      lastReportedState: this.lastReportedState,
      lastReportedAt: this.lastReportedAt,
      initialized: this.initialized,
      suspended: this.suspended,
    }
  }

  /**
   * Live status for the introspection surface: always a fresh raw read,
   * never the debounced value.
   */
  public async readStatus(): Promise<LidStatus> {
    const res = await this.evaluateRaw()
    return res.ok ? res.value : 'unsupported'
  }

  /* ---------------------------------------------------------------------- */
  /*  Engine                                                                 */
  /* ---------------------------------------------------------------------- */

  public async evaluateRaw(): Promise<SensorReadResult> {
    try {
      return await this.platform.queryLid()
    } catch (err) {
      return {
        ok: false,
        error: {
          kind: 'sensor-unavailable',
          message: 'lid state query failed',
          detail: err instanceof Error ? err.message : String(err),
        },
      }
    }
  }

  /**
   * Single entry point shared by raw evaluations and notifications.
   * Returns the reports delivered, in order.
   */
  public notifyState(observed: LidState, at: number): LidReport[] {
    const decision = reconcileLidReport(
      { lastReportedState: this.lastReportedState, lastReportedAt: this.lastReportedAt },
      observed,
      at,
      this.policy,
      this.intervalMs
    )

    if (decision.nonCompliant && !this.nonCompliantWarned) {
      this.nonCompliantWarned = true
      this.events.publish({
        kind: 'lid-firmware-noncompliant',
        at,
        observed,
        sinceLastMs: at - this.lastReportedAt,
      })
    }

    if (decision.reports.length === 0) return decision.reports

    this.lastReportedState = decision.next.lastReportedState
    this.lastReportedAt = decision.next.lastReportedAt

    for (const r of decision.reports) {
      this.events.publish({
        kind: 'lid-switch-reported',
        at,
        state: r.state,
        synthetic: r.synthetic,
      })
    }

    return decision.reports
  }

  /* ---------------------------------------------------------------------- */
  /*  Lifecycle (called by the Fastify plugin)                               */
  /* ---------------------------------------------------------------------- */

  /** Device-opened path: rebaseline from a raw read, then apply the policy. */
  public async open(): Promise<void> {
    await this.lock.runExclusive(async () => {
      await this.rebaseline()
      await this.runInitialize('open')
    })
  }

  /** Re-apply the policy without rebaselining. */
  public async initialize(): Promise<void> {
    await this.lock.runExclusive(() => this.runInitialize('initialize'))
  }

  /**
   * Asynchronous firmware notification. The code and the initialized flag
   * are checked on arrival: a notification racing open() is dropped, never
   * queued behind it.
   */
  public async notify(event: number = LID_NOTIFY_STATUS): Promise<LidReport[]> {
    if (event !== LID_NOTIFY_STATUS) {
      this.dropNotification(event, 'unsupported-event')
      return []
    }

    if (!this.initialized) {
      this.dropNotification(event, 'not-initialized')
      return []
    }

    return await this.lock.runExclusive(async () => {
      // closed while queued
      if (!this.initialized) {
        this.dropNotification(event, 'not-initialized')
        return []
      }
      return await this.updateFromRaw(true)
    })
  }

  public async suspend(): Promise<void> {
    await this.lock.runExclusive(() => {
      this.suspended = true
      this.events.publish({ kind: 'lid-suspended', at: this.clock() })
    })
  }

  /**
   * Time spent suspended must not count toward the report interval, so the
   * pair is rebaselined before the policy runs again.
   */
  public async resume(): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.suspended = false
      const raw = await this.rebaseline()
      this.events.publish({ kind: 'lid-resumed', at: this.lastReportedAt, state: raw })
      await this.runInitialize('resume')
    })
  }

  /** Unbind: later notifications are dropped until the next open. */
  public async close(): Promise<void> {
    await this.lock.runExclusive(() => {
      this.initialized = false
      this.events.publish({ kind: 'lid-unbound', at: this.clock() })
    })
  }

  /* ---------------------------------------------------------------------- */
  /*  Internals (lock held)                                                  */
  /* ---------------------------------------------------------------------- */

  /** Returns the raw value read, or null when the query failed. */
  private async rebaseline(): Promise<LidState | null> {
    const res = await this.evaluateRaw()
    if (!res.ok) this.reportError(res.error)

    // An unknown state is never taken as closed.
    this.lastReportedState = res.ok ? res.value : 'open'
    this.lastReportedAt = this.clock()
    return res.ok ? res.value : null
  }

  private async runInitialize(trigger: InitTrigger): Promise<void> {
    switch (this.policy) {
      case 'open': {
        this.notifyState('open', this.clock())
        break
      }
      case 'method': {
        await this.updateFromRaw(false)
        break
      }
      case 'ignore':
      case 'disabled':
      default: {
        break
      }
    }

    this.initialized = true
    this.events.publish({
      kind: 'lid-initialized',
      at: this.clock(),
      policy: this.policy,
      trigger,
    })
  }

  private async updateFromRaw(signalWakeup: boolean): Promise<LidReport[]> {
    const res = await this.evaluateRaw()
    if (!res.ok) {
      this.reportError(res.error)
      return []
    }

    const at = this.clock()

    if (signalWakeup && res.value === 'open' && this.lastReportedState === 'closed') {
      this.platform.signalWakeup()
      this.events.publish({ kind: 'lid-wakeup-signalled', at })
    }

    return this.notifyState(res.value, at)
  }

  private dropNotification(event: number, reason: 'not-initialized' | 'unsupported-event'): void {
    this.events.publish({ kind: 'lid-notification-dropped', at: this.clock(), event, reason })
  }

  private reportError(error: LidError): void {
    this.events.publish({ kind: 'recoverable-error', at: this.clock(), error })
  }
}
