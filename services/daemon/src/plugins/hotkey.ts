// services/daemon/src/plugins/hotkey.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import { createLogger, LogChannel } from '@lidwatch/logging'

import {
  WirelessHotkeyService,
  type HotkeyEvent,
} from '../devices/wireless-hotkey/WirelessHotkeyService.js'
import { getSnapshot, updateHotkeySnapshot } from '../core/state.js'
import { FanoutEventSink, errorMessage } from '../core/sinks.js'
import { parseNotifyBody, type NotifyBody } from '../core/notify.js'

declare module 'fastify' {
  interface FastifyInstance {
    hotkey: WirelessHotkeyService
  }
}

const hotkeyPlugin: FastifyPluginAsync<{ clock?: () => number }> = async (
  app: FastifyInstance,
  opts: { clock?: () => number }
) => {
  const { channel } = createLogger('hotkey', app.clientBuf)
  const logHotkey = channel(LogChannel.hotkey)

  const events = new FanoutEventSink<HotkeyEvent>(
    (err, evt) => logHotkey.warn(`hotkey event sink failed kind=${evt.kind}`, { err: errorMessage(err) }),
    {
      publish(evt: HotkeyEvent): void {
        if (evt.kind === 'hotkey-unknown-event') {
          logHotkey.warn(`unknown radio hotkey event: 0x${evt.event.toString(16)}`)
        } else if (evt.pressed) {
          logHotkey.debug(`kind=${evt.kind} key=${evt.key}`)
        }
      },
    },
    {
      publish(evt: HotkeyEvent): void {
        const prev = getSnapshot().hotkey
        if (evt.kind === 'hotkey-unknown-event') {
          updateHotkeySnapshot({ unknownEvents: prev.unknownEvents + 1 })
        } else if (!evt.pressed) {
          updateHotkeySnapshot({ taps: prev.taps + 1, lastTapAt: evt.at })
        }
      },
    }
  )

  const svc = new WirelessHotkeyService({ events, clock: opts.clock })
  app.decorate('hotkey', svc)

  app.post<{ Body: NotifyBody }>('/api/hotkey/notify', async (req, reply) => {
    const parsed = parseNotifyBody(req.body)
    if (!parsed.ok) {
      reply.code(400)
      return { ok: false, error: parsed.error }
    }
    return { ok: true, delivered: svc.notify(parsed.event) }
  })
}

export default fp(hotkeyPlugin, {
  name: 'hotkey-plugin',
})
