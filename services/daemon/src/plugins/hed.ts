// services/daemon/src/plugins/hed.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import { createLogger, LogChannel } from '@lidwatch/logging'

import { HardwareErrorRelay } from '../devices/hardware-error/HardwareErrorRelay.js'
import type { HedEvent } from '../devices/hardware-error/types.js'
import { updateHardwareErrorSnapshot } from '../core/state.js'
import { FanoutEventSink, errorMessage } from '../core/sinks.js'

declare module 'fastify' {
  interface FastifyInstance {
    hed: HardwareErrorRelay
  }
}

export interface HedPluginOptions {
  deviceId?: string
  clock?: () => number
}

const hedPlugin: FastifyPluginAsync<HedPluginOptions> = async (
  app: FastifyInstance,
  opts: HedPluginOptions
) => {
  const { channel } = createLogger('hed', app.clientBuf)
  const logHed = channel(LogChannel.hed)

  const deviceId = opts.deviceId ?? process.env.HED_DEVICE_ID ?? 'PNP0C33:00'
  let notifications = 0

  const events = new FanoutEventSink<HedEvent>(
    (err, evt) => logHed.warn(`hed event sink failed kind=${evt.kind}`, { err: errorMessage(err) }),
    {
      publish(evt: HedEvent): void {
        switch (evt.kind) {
          case 'hed-bound':
          case 'hed-unbound': {
            logHed.info(`kind=${evt.kind} device=${evt.deviceId}`)
            break
          }
          case 'hed-notified': {
            logHed.debug(`kind=${evt.kind} listeners=${evt.listenersCalled} stopped=${evt.stopped}`)
            break
          }
          case 'hed-notification-ignored': {
            logHed.debug(`kind=${evt.kind} reason=${evt.reason}`)
            break
          }
          case 'hed-listener-failed': {
            logHed.error(`kind=${evt.kind} error=${evt.message}`)
            break
          }
          default: {
            break
          }
        }
      },
    },
    {
      publish(evt: HedEvent): void {
        if (evt.kind === 'hed-bound') updateHardwareErrorSnapshot({ deviceId: evt.deviceId })
        if (evt.kind === 'hed-unbound') updateHardwareErrorSnapshot({ deviceId: null })
        if (evt.kind === 'hed-notified') {
          notifications += 1
          updateHardwareErrorSnapshot({ notifications, lastNotifiedAt: evt.at })
        }
      },
    }
  )

  const relay = new HardwareErrorRelay({ events, clock: opts.clock })
  app.decorate('hed', relay)

  // Baseline consumer: every hardware error notification is logged.
  relay.register(() => {
    logHed.warn('hardware error notification received')
  })

  app.addHook('onReady', async () => {
    const res = relay.bind(deviceId)
    if (!res.ok) logHed.warn(res.error.message, { boundTo: res.error.boundTo })
    updateHardwareErrorSnapshot({ listeners: relay.listenerCount() })
  })

  app.addHook('onClose', async () => {
    relay.unbind()
  })

  app.post('/api/hed/notify', async () => {
    const listenersCalled = relay.notify()
    return { ok: true, listenersCalled }
  })
}

export default fp(hedPlugin, {
  name: 'hed-plugin',
})
