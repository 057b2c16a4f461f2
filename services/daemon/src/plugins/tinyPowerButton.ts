// services/daemon/src/plugins/tinyPowerButton.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import { createLogger, LogChannel } from '@lidwatch/logging'

import { TinyPowerButtonService } from '../devices/tiny-power-button/TinyPowerButtonService.js'
import type {
  SignalSender,
  TinyPowerButtonEvent,
} from '../devices/tiny-power-button/types.js'
import { buildTinyPowerButtonConfigFromEnv } from '../devices/tiny-power-button/utils.js'
import { getSnapshot, updateTinyPowerButtonSnapshot } from '../core/state.js'
import { FanoutEventSink, errorMessage } from '../core/sinks.js'
import { parseNotifyBody, type NotifyBody } from '../core/notify.js'

declare module 'fastify' {
  interface FastifyInstance {
    tinyPowerButton: TinyPowerButtonService
  }
}

export interface TinyPowerButtonPluginOptions {
  /** Defaults to process.kill. */
  sender?: SignalSender
  clock?: () => number
  env?: NodeJS.ProcessEnv
}

const processSender: SignalSender = {
  send(pid, signal): void {
    process.kill(pid, signal)
  },
}

const tinyPowerButtonPlugin: FastifyPluginAsync<TinyPowerButtonPluginOptions> = async (
  app: FastifyInstance,
  opts: TinyPowerButtonPluginOptions
) => {
  const { channel } = createLogger('tiny-power-button', app.clientBuf)
  const logPower = channel(LogChannel.power)

  const cfg = buildTinyPowerButtonConfigFromEnv(opts.env ?? process.env)

  const events = new FanoutEventSink<TinyPowerButtonEvent>(
    (err, evt) => logPower.warn(`power button event sink failed kind=${evt.kind}`, { err: errorMessage(err) }),
    {
      publish(evt: TinyPowerButtonEvent): void {
        switch (evt.kind) {
          case 'power-signal-sent': {
            logPower.info(`kind=${evt.kind} pid=${evt.pid} signal=${evt.signal}`)
            break
          }
          case 'power-signal-failed': {
            logPower.error(`kind=${evt.kind} pid=${evt.pid} signal=${evt.signal} error=${evt.message}`)
            break
          }
          case 'power-signal-skipped': {
            logPower.debug(`kind=${evt.kind} reason=${evt.reason}`)
            break
          }
          default: {
            break
          }
        }
      },
    },
    {
      publish(evt: TinyPowerButtonEvent): void {
        const prev = getSnapshot().tinyPowerButton
        if (evt.kind === 'power-signal-sent') {
          updateTinyPowerButtonSnapshot({ sent: prev.sent + 1, lastSentAt: evt.at })
        } else if (evt.kind === 'power-signal-failed') {
          updateTinyPowerButtonSnapshot({ failed: prev.failed + 1 })
        }
      },
    }
  )

  const svc = new TinyPowerButtonService(cfg, {
    sender: opts.sender ?? processSender,
    events,
    clock: opts.clock,
  })
  app.decorate('tinyPowerButton', svc)

  updateTinyPowerButtonSnapshot({ enabled: cfg.enabled, signal: cfg.signal, pid: cfg.pid })
  if (cfg.enabled) logPower.info(`tiny power button enabled pid=${cfg.pid} signal=${cfg.signal}`)

  app.post<{ Body: NotifyBody }>('/api/tiny-power-button/notify', async (req, reply) => {
    const parsed = parseNotifyBody(req.body)
    if (!parsed.ok) {
      reply.code(400)
      return { ok: false, error: parsed.error }
    }
    return { ok: true, sent: svc.notify(parsed.event), signal: svc.getSignal(), pid: svc.getPid() }
  })
}

export default fp(tinyPowerButtonPlugin, {
  name: 'tiny-power-button-plugin',
})
