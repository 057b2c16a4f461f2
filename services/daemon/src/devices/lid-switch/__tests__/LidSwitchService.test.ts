import { beforeEach, describe, expect, it } from 'vitest'
import { LidSwitchService } from '../LidSwitchService'
import { LidInputDevice } from '../LidInputDevice'
import type { LidInitPolicy, LidState, LidSwitchEvent } from '../types'
import { FakeClock, FakeLidPlatform, RecordingSink } from './fakes'

function makeService(policy: LidInitPolicy, raw: LidState | 'fail' | 'throw' = 'open', reportIntervalMs = 500) {
  const platform = new FakeLidPlatform(raw)
  const sink = new RecordingSink()
  const clock = new FakeClock(0)
  const svc = new LidSwitchService(
    { policy, reportIntervalMs },
    { platform, events: sink, clock: clock.now }
  )
  return { svc, platform, sink, clock }
}

describe('LidSwitchService', () => {
  describe('open / initialize', () => {
    it('reports the raw value under method', async () => {
      const { svc, platform, sink } = makeService('method', 'closed')

      await svc.open()

      expect(sink.reported()).toEqual([{ state: 'closed', synthetic: false }])
      expect(platform.queries).toBe(2)
      expect(svc.getState()).toEqual({
        lastReportedState: 'closed',
        lastReportedAt: 0,
        initialized: true,
        suspended: false,
      })
      const init = sink.events.find((e) => e.kind === 'lid-initialized')
      expect(init).toEqual({ kind: 'lid-initialized', at: 0, policy: 'method', trigger: 'open' })
    })

    it('delivers exactly one open with no raw query under open', async () => {
      const { svc, platform, sink } = makeService('open', 'closed')

      await svc.initialize()

      expect(sink.reported()).toEqual([{ state: 'open', synthetic: false }])
      expect(platform.queries).toBe(0)
      expect(sink.events.find((e) => e.kind === 'lid-initialized')).toEqual({
        kind: 'lid-initialized',
        at: 0,
        policy: 'open',
        trigger: 'initialize',
      })
    })

    it('publishes lid-unbound on close', async () => {
      const { svc, sink } = makeService('ignore', 'open')
      await svc.open()
      sink.clear()

      await svc.close()

      expect(sink.events).toEqual([{ kind: 'lid-unbound', at: 0 }])
      expect(svc.getState().initialized).toBe(false)
    })

    it('reports nothing at open under ignore', async () => {
      const { svc, sink } = makeService('ignore', 'closed')

      await svc.open()

      expect(sink.reported()).toEqual([])
      expect(svc.getState().lastReportedState).toBe('closed')
      expect(svc.getState().initialized).toBe(true)
    })

    it('rebaselines to open when the raw read fails', async () => {
      const { svc, sink, clock } = makeService('method', 'fail')
      clock.t = 42

      await svc.open()

      expect(sink.reported()).toEqual([])
      expect(sink.kinds()).toEqual(['recoverable-error', 'recoverable-error', 'lid-initialized'])
      expect(svc.getState()).toEqual({
        lastReportedState: 'open',
        lastReportedAt: 42,
        initialized: true,
        suspended: false,
      })
    })

    it('turns a thrown query into sensor-unavailable', async () => {
      const { svc, sink } = makeService('ignore', 'throw')

      await svc.open()

      const err = sink.events.find((e) => e.kind === 'recoverable-error')
      expect(err).toEqual({
        kind: 'recoverable-error',
        at: 0,
        error: { kind: 'sensor-unavailable', message: 'lid state query failed', detail: 'bus timeout' },
      })
    })
  })

  describe('notify', () => {
    it('drops notifications before initialization', async () => {
      const { svc, platform, sink } = makeService('method', 'closed')

      const reports = await svc.notify()

      expect(reports).toEqual([])
      expect(platform.queries).toBe(0)
      expect(sink.events).toEqual([
        { kind: 'lid-notification-dropped', at: 0, event: 0x80, reason: 'not-initialized' },
      ])
    })

    it('drops a notification that arrives while open is still running', async () => {
      const { svc, platform, sink } = makeService('method', 'closed')
      let release = (): void => {}
      platform.gate = new Promise<void>((resolve) => { release = resolve })

      const opening = svc.open()
      const early = svc.notify()
      release()
      await opening

      expect(await early).toEqual([])
      expect(sink.events).toContainEqual({
        kind: 'lid-notification-dropped',
        at: 0,
        event: 0x80,
        reason: 'not-initialized',
      })
      expect(sink.reported()).toEqual([{ state: 'closed', synthetic: false }])
      expect(platform.queries).toBe(2)
    })

    it('drops a queued notification when the sensor closes first', async () => {
      const { svc, platform, sink } = makeService('method', 'closed')
      await svc.open()
      let release = (): void => {}
      platform.gate = new Promise<void>((resolve) => { release = resolve })
      sink.clear()

      const resuming = svc.resume()
      const closing = svc.close()
      const late = svc.notify()
      release()
      await Promise.all([resuming, closing])

      expect(await late).toEqual([])
      expect(sink.kinds().slice(-2)).toEqual(['lid-unbound', 'lid-notification-dropped'])
    })

    it('drops unsupported notification codes', async () => {
      const { svc, sink } = makeService('method', 'closed')
      await svc.open()
      sink.clear()

      const reports = await svc.notify(0x81)

      expect(reports).toEqual([])
      expect(sink.events).toEqual([
        { kind: 'lid-notification-dropped', at: 0, event: 0x81, reason: 'unsupported-event' },
      ])
    })

    it('drops notifications after close', async () => {
      const { svc, sink } = makeService('method', 'closed')
      await svc.open()
      await svc.close()
      sink.clear()

      expect(await svc.notify()).toEqual([])
      expect(sink.kinds()).toEqual(['lid-notification-dropped'])
    })

    it('signals wakeup on an observed closed to open transition', async () => {
      const { svc, platform, sink, clock } = makeService('ignore', 'closed')
      await svc.open()

      platform.raw = 'open'
      clock.t = 100
      const reports = await svc.notify()

      expect(reports).toEqual([{ state: 'open', synthetic: false }])
      expect(platform.wakeups).toBe(1)
      expect(sink.kinds()).toContain('lid-wakeup-signalled')
    })

    it('does not signal wakeup for open to closed or unchanged values', async () => {
      const { svc, platform, clock } = makeService('method', 'open')
      await svc.open()

      platform.raw = 'closed'
      clock.t = 100
      await svc.notify()
      clock.t = 200
      await svc.notify()

      expect(platform.wakeups).toBe(0)
    })

    it('does not signal wakeup during initialization', async () => {
      const { svc, platform } = makeService('method', 'open')
      await svc.open()
      await svc.resume()

      expect(platform.wakeups).toBe(0)
    })

    it('debounces a held closed and complements it once decayed under ignore', async () => {
      const { svc, platform, sink, clock } = makeService('ignore', 'closed')
      await svc.open()

      clock.t = 200
      expect(await svc.notify()).toEqual([])

      clock.t = 600
      expect(await svc.notify()).toEqual([
        { state: 'open', synthetic: true },
        { state: 'closed', synthetic: false },
      ])
      expect(svc.getState().lastReportedAt).toBe(600)
      expect(platform.wakeups).toBe(0)

      clock.t = 1200
      await svc.notify()

      const warnings = sink.events.filter((e) => e.kind === 'lid-firmware-noncompliant')
      expect(warnings).toEqual([
        { kind: 'lid-firmware-noncompliant', at: 600, observed: 'closed', sinceLastMs: 600 },
      ])
    })

    it('re-delivers a held open without a complement under ignore', async () => {
      const { svc, clock } = makeService('ignore', 'open')
      await svc.open()

      clock.t = 1000
      expect(await svc.notify()).toEqual([{ state: 'open', synthetic: false }])
    })

    it('publishes reports after the pair is updated', async () => {
      const platform = new FakeLidPlatform('closed')
      const clock = new FakeClock(0)
      const seen: Array<{ evt: LidSwitchEvent; state: LidState }> = []
      const probe: LidSwitchService = new LidSwitchService(
        { policy: 'ignore', reportIntervalMs: 500 },
        {
          platform,
          clock: clock.now,
          events: {
            publish(evt: LidSwitchEvent): void {
              seen.push({ evt, state: probe.getState().lastReportedState })
            },
          },
        }
      )
      await probe.open()

      platform.raw = 'open'
      clock.t = 50
      await probe.notify()

      const report = seen.find((s) => s.evt.kind === 'lid-switch-reported')
      expect(report?.state).toBe('open')
    })
  })

  describe('input layer delivery', () => {
    it('suppresses a repeated closed under method but delivers the complement pulse', async () => {
      const input = new LidInputDevice()
      const delivered: LidState[] = []
      input.subscribe((s) => { delivered.push(s) })

      const platform = new FakeLidPlatform('closed')
      const clock = new FakeClock(0)
      const events = {
        publish(evt: LidSwitchEvent): void {
          if (evt.kind === 'lid-switch-reported') input.report(evt.state)
        },
      }

      const method = new LidSwitchService({ policy: 'method', reportIntervalMs: 500 }, { platform, events, clock: clock.now })
      await method.open()
      expect(delivered).toEqual(['closed'])

      clock.t = 100
      expect(await method.notify()).toEqual([{ state: 'closed', synthetic: false }])
      expect(delivered).toEqual(['closed'])

      await method.close()
      const ignore = new LidSwitchService({ policy: 'ignore', reportIntervalMs: 500 }, { platform, events, clock: clock.now })
      clock.t = 0
      await ignore.open()
      clock.t = 600
      await ignore.notify()

      expect(delivered).toEqual(['closed', 'open', 'closed'])
    })
  })

  describe('suspend / resume', () => {
    let ctx: ReturnType<typeof makeService>

    beforeEach(async () => {
      ctx = makeService('ignore', 'open')
      await ctx.svc.open()
    })

    it('resets the report timestamp so a post-resume change is fresh', async () => {
      const { svc, platform, sink, clock } = ctx

      clock.t = 1000
      await svc.suspend()
      expect(svc.getState().suspended).toBe(true)

      clock.t = 50_000
      await svc.resume()
      expect(svc.getState()).toEqual({
        lastReportedState: 'open',
        lastReportedAt: 50_000,
        initialized: true,
        suspended: false,
      })
      expect(sink.events.find((e) => e.kind === 'lid-resumed')).toEqual({
        kind: 'lid-resumed',
        at: 50_000,
        state: 'open',
      })

      sink.clear()
      platform.raw = 'closed'
      clock.t = 50_100
      expect(await svc.notify()).toEqual([{ state: 'closed', synthetic: false }])
      expect(sink.kinds()).not.toContain('lid-firmware-noncompliant')
    })

    it('does not count the suspend gap toward decay', async () => {
      const { svc, clock } = ctx

      await svc.suspend()
      clock.t = 50_000
      await svc.resume()

      clock.t = 50_100
      expect(await svc.notify()).toEqual([])
    })

    it('re-runs the policy with a resume trigger', async () => {
      const { svc, sink, clock } = ctx
      sink.clear()

      clock.t = 10
      await svc.resume()

      expect(sink.events.find((e) => e.kind === 'lid-initialized')).toEqual({
        kind: 'lid-initialized',
        at: 10,
        policy: 'ignore',
        trigger: 'resume',
      })
    })

    it('reports a failed resume read as an unknown state and rebaselines to open', async () => {
      const { svc, platform, sink, clock } = ctx
      platform.raw = 'fail'
      clock.t = 77

      await svc.resume()

      expect(sink.events.find((e) => e.kind === 'lid-resumed')).toEqual({ kind: 'lid-resumed', at: 77, state: null })
      expect(svc.getState().lastReportedState).toBe('open')
    })
  })

  describe('introspection', () => {
    it('reads the live raw value, not the debounced one', async () => {
      const { svc, platform } = makeService('ignore', 'closed')
      await svc.open()

      platform.raw = 'open'
      expect(await svc.readStatus()).toBe('open')
      expect(svc.getState().lastReportedState).toBe('closed')
    })

    it('reads unsupported when the query fails', async () => {
      const { svc } = makeService('ignore', 'fail')
      expect(await svc.readStatus()).toBe('unsupported')
    })

    it('accepts a new report interval and rejects invalid ones', () => {
      const { svc, sink } = makeService('ignore')

      expect(svc.setReportInterval(250)).toEqual({ ok: true, value: 250 })
      expect(svc.getReportInterval()).toBe(250)
      expect(sink.events).toEqual([{ kind: 'lid-report-interval-changed', at: 0, reportIntervalMs: 250 }])

      const bad = svc.setReportInterval(-1)
      expect(bad.ok).toBe(false)
      if (!bad.ok) expect(bad.error.kind).toBe('invalid-report-interval')
      expect(svc.setReportInterval('500').ok).toBe(false)
      expect(svc.getReportInterval()).toBe(250)
    })

    it('exposes its policy', () => {
      expect(makeService('open').svc.getPolicy()).toBe('open')
    })
  })

  describe('serialization', () => {
    it('runs concurrent notifications one at a time in arrival order', async () => {
      const { svc, platform, clock } = makeService('ignore', 'closed')
      await svc.open()

      platform.raw = 'open'
      clock.t = 100
      const first = svc.notify()
      const second = svc.notify()

      expect(await first).toEqual([{ state: 'open', synthetic: false }])
      expect(await second).toEqual([])
    })
  })
})
