// services/daemon/src/plugins/lidSwitch.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import { createLogger, LogChannel, type ChannelLogger } from '@lidwatch/logging'

import { LidInputDevice } from '../devices/lid-switch/LidInputDevice.js'
import { LidPolicyConfig } from '../devices/lid-switch/policy.js'
import { LidSensorRegistry } from '../devices/lid-switch/registry.js'
import type {
  LidPlatform,
  LidSwitchEvent,
  LidSwitchEventSink,
  SystemIdentity,
} from '../devices/lid-switch/types.js'
import {
  buildLidSwitchConfigFromEnv,
  formatLidStatus,
  isValidReportInterval,
  MAX_REPORT_INTERVAL_MS,
} from '../devices/lid-switch/utils.js'
import { LidSwitchStateAdapter } from '../adapters/lidSwitch.adapter.js'
import { FsLidPlatform, readSystemIdentity } from '../platform/acpiFs.js'
import { updateLidSwitchSnapshot } from '../core/state.js'
import { FanoutEventSink, errorMessage } from '../core/sinks.js'
import { parseNotifyBody, type NotifyBody } from '../core/notify.js'

// ---- Fastify decoration ----------------------------------------------------

declare module 'fastify' {
  interface FastifyInstance {
    lidPolicy: LidPolicyConfig
    lidSensors: LidSensorRegistry
    lidInput: LidInputDevice
  }
}

export interface LidSwitchPluginOptions {
  /** Defaults to the procfs-style state file from LID_STATE_PATH. */
  platform?: LidPlatform
  /** Defaults to the DMI fields under DMI_ID_DIR. */
  identity?: SystemIdentity
  clock?: () => number
  env?: NodeJS.ProcessEnv
}

// ---- Event sink using daemon logging ---------------------------------------

class LidSwitchLoggerEventSink implements LidSwitchEventSink {
  private readonly logLid: ChannelLogger

  constructor(app: FastifyInstance) {
    const { channel } = createLogger('lid-switch', app.clientBuf)
    this.logLid = channel(LogChannel.lid)
  }

  publish(evt: LidSwitchEvent): void {
    switch (evt.kind) {
      case 'lid-switch-reported': {
        this.logLid.info(`kind=${evt.kind} state=${evt.state}${evt.synthetic ? ' synthetic=true' : ''}`)
        break
      }
      case 'lid-initialized': {
        this.logLid.info(`kind=${evt.kind} policy=${evt.policy} trigger=${evt.trigger}`)
        break
      }
      case 'lid-firmware-noncompliant': {
        this.logLid.warn('the lid device is not compliant to SW_LID', {
          observed: evt.observed,
          sinceLastMs: Math.round(evt.sinceLastMs),
        })
        break
      }
      case 'lid-notification-dropped': {
        this.logLid.debug(`kind=${evt.kind} event=0x${evt.event.toString(16)} reason=${evt.reason}`)
        break
      }
      case 'lid-wakeup-signalled': {
        this.logLid.info(`kind=${evt.kind}`)
        break
      }
      case 'lid-unbound': {
        this.logLid.info(`kind=${evt.kind}`)
        break
      }
      case 'lid-suspended': {
        this.logLid.info(`kind=${evt.kind}`)
        break
      }
      case 'lid-resumed': {
        this.logLid.info(`kind=${evt.kind} state=${evt.state ?? 'unknown'}`)
        break
      }
      case 'lid-report-interval-changed': {
        this.logLid.info(`kind=${evt.kind} reportIntervalMs=${evt.reportIntervalMs}`)
        break
      }
      case 'recoverable-error': {
        this.logLid.warn(`kind=${evt.kind} error=${evt.error.message}`, { errorKind: evt.error.kind })
        break
      }
      default: {
        break
      }
    }
  }
}

// ---- Plugin implementation -------------------------------------------------

const NO_SENSOR = { ok: false, error: 'no lid sensor bound' } as const

const lidSwitchPlugin: FastifyPluginAsync<LidSwitchPluginOptions> = async (
  app: FastifyInstance,
  opts: LidSwitchPluginOptions
) => {
  const env = opts.env ?? process.env
  const { channel } = createLogger('lid-switch-plugin', app.clientBuf)
  const logPlugin = channel(LogChannel.app)

  const cfg = buildLidSwitchConfigFromEnv(env)
  let reportIntervalMs = cfg.reportIntervalMs

  const policy = new LidPolicyConfig()
  if (cfg.forcedPolicy) {
    const forced = policy.force(cfg.forcedPolicy)
    if (!forced.ok) logPlugin.warn(`ignoring LID_INIT_STATE: ${forced.error.message}`)
  }

  const registry = new LidSensorRegistry()
  const input = new LidInputDevice()
  const stateAdapter = new LidSwitchStateAdapter()
  const loggerSink = new LidSwitchLoggerEventSink(app)

  const events: LidSwitchEventSink = new FanoutEventSink<LidSwitchEvent>(
    (err, evt) => logPlugin.warn(`lid event sink failed kind=${evt.kind}`, { err: errorMessage(err) }),
    loggerSink,
    {
      publish(evt: LidSwitchEvent): void {
        if (evt.kind === 'lid-switch-reported') input.report(evt.state)
      },
    },
    {
      publish(evt: LidSwitchEvent): void {
        stateAdapter.handle(evt)
        updateLidSwitchSnapshot(stateAdapter.getState())
      },
    }
  )

  const platform: LidPlatform =
    opts.platform ??
    new FsLidPlatform({
      statePath: cfg.statePath,
      onWakeup: () => logPlugin.info('wakeup source=lid'),
    })

  app.decorate('lidPolicy', policy)
  app.decorate('lidSensors', registry)
  app.decorate('lidInput', input)

  app.addHook('onReady', async () => {
    const identity = opts.identity ?? (await readSystemIdentity(cfg.dmiDir))
    const resolution = policy.resolve(identity)
    logPlugin.info(
      `lid init state policy=${resolution.policy} source=${resolution.source}` +
        (resolution.quirk ? ` quirk="${resolution.quirk.label}"` : '')
    )

    const bound = registry.bind(
      { policy: resolution.policy, reportIntervalMs },
      { platform, events, clock: opts.clock }
    )
    if (!bound.ok) {
      logPlugin.info(`lid sensor not bound: ${bound.error.message}`)
      stateAdapter.unbound(resolution.policy)
      updateLidSwitchSnapshot(stateAdapter.getState())
      return
    }

    stateAdapter.bound(resolution.policy, reportIntervalMs)
    updateLidSwitchSnapshot(stateAdapter.getState())
    await bound.value.open()
  })

  app.addHook('onClose', async () => {
    logPlugin.info('unbinding lid sensor')
    await registry.unbind().catch((err: unknown) => {
      logPlugin.warn('error unbinding lid sensor', { err: errorMessage(err) })
    })
    input.reset()
  })

  // ---- Routes --------------------------------------------------------------

  app.post<{ Body: NotifyBody }>('/api/lid/notify', async (req, reply) => {
    const svc = registry.current()
    if (!svc) {
      reply.code(404)
      return NO_SENSOR
    }
    const parsed = parseNotifyBody(req.body)
    if (!parsed.ok) {
      reply.code(400)
      return { ok: false, error: parsed.error }
    }
    const reports = await svc.notify(parsed.event)
    return { ok: true, reports }
  })

  app.get('/api/lid/state', async (_req, reply) => {
    const svc = registry.current()
    if (!svc) {
      reply.code(404)
      return NO_SENSOR
    }
    return { state: await svc.readStatus() }
  })

  app.get('/api/lid/state.txt', async (_req, reply) => {
    const svc = registry.current()
    if (!svc) {
      reply.code(404)
      return NO_SENSOR
    }
    reply.type('text/plain; charset=utf-8')
    return formatLidStatus(await svc.readStatus())
  })

  app.get('/api/lid/config', async () => ({
    initState: policy.describe(),
    policy: policy.current(),
    reportIntervalMs: registry.current()?.getReportInterval() ?? reportIntervalMs,
  }))

  app.put<{ Body: { policy?: unknown } | undefined }>('/api/lid/init-state', async (req, reply) => {
    const name = req.body?.policy
    if (typeof name !== 'string') {
      reply.code(400)
      return { ok: false, error: 'policy (string) required' }
    }
    const res = policy.force(name)
    if (!res.ok) {
      reply.code(400)
      return { ok: false, error: res.error.message, kind: res.error.kind }
    }
    logPlugin.info(`initial lid state set to '${res.value}'`)
    return { ok: true, policy: res.value }
  })

  app.put<{ Body: { ms?: unknown } | undefined }>('/api/lid/report-interval', async (req, reply) => {
    const ms = req.body?.ms
    if (!isValidReportInterval(ms)) {
      reply.code(400)
      return { ok: false, error: `ms must be an integer between 0 and ${MAX_REPORT_INTERVAL_MS}` }
    }
    reportIntervalMs = ms
    const svc = registry.current()
    if (svc) {
      const res = svc.setReportInterval(ms)
      if (!res.ok) {
        reply.code(400)
        return { ok: false, error: res.error.message }
      }
    }
    return { ok: true, reportIntervalMs: ms }
  })
}

export default fp(lidSwitchPlugin, {
  name: 'lid-switch-plugin',
})
