// services/daemon/src/plugins/buttons.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import { createLogger, LogChannel, type ChannelLogger } from '@lidwatch/logging'

import { ButtonRelayService } from '../devices/button/ButtonRelayService.js'
import type {
  ButtonEvent,
  ButtonEventSink,
  ButtonKind,
  ButtonPlatform,
} from '../devices/button/types.js'
import { ButtonStateAdapter } from '../adapters/button.adapter.js'
import { updateButtonSnapshot } from '../core/state.js'
import { FanoutEventSink, errorMessage } from '../core/sinks.js'
import { parseNotifyBody, type NotifyBody } from '../core/notify.js'

// ---- Fastify decoration ----------------------------------------------------

declare module 'fastify' {
  interface FastifyInstance {
    buttons: Record<ButtonKind, ButtonRelayService>
  }
}

export interface ButtonsPluginOptions {
  platform?: ButtonPlatform
  clock?: () => number
}

// ---- Event sink using daemon logging ---------------------------------------

class ButtonLoggerEventSink implements ButtonEventSink {
  private readonly logBtn: ChannelLogger

  constructor(app: FastifyInstance) {
    const { channel } = createLogger('button', app.clientBuf)
    this.logBtn = channel(LogChannel.button)
  }

  publish(evt: ButtonEvent): void {
    switch (evt.kind) {
      case 'button-pressed': {
        this.logBtn.info(`kind=${evt.kind} button=${evt.button} pushed=${evt.pushed}`)
        break
      }
      case 'button-suppressed': {
        this.logBtn.info(`kind=${evt.kind} button=${evt.button} reason=${evt.reason}`)
        break
      }
      case 'button-unsupported-event': {
        this.logBtn.debug(`kind=${evt.kind} button=${evt.button} event=0x${evt.event.toString(16)}`)
        break
      }
      case 'button-suspend-changed': {
        this.logBtn.debug(`kind=${evt.kind} button=${evt.button} suspended=${evt.suspended}`)
        break
      }

      // Noise suppressed: press/release edges are implied by button-pressed
      case 'button-key': {
        break
      }

      default: {
        break
      }
    }
  }
}

// ---- Plugin implementation -------------------------------------------------

function isButtonKind(v: string): v is ButtonKind {
  return v === 'power' || v === 'sleep'
}

const buttonsPlugin: FastifyPluginAsync<ButtonsPluginOptions> = async (
  app: FastifyInstance,
  opts: ButtonsPluginOptions
) => {
  const { channel } = createLogger('buttons-plugin', app.clientBuf)
  const logPlugin = channel(LogChannel.app)

  const stateAdapter = new ButtonStateAdapter()
  const events: ButtonEventSink = new FanoutEventSink<ButtonEvent>(
    (err, evt) => logPlugin.warn(`button event sink failed kind=${evt.kind}`, { err: errorMessage(err) }),
    new ButtonLoggerEventSink(app),
    {
      publish(evt: ButtonEvent): void {
        const changed = stateAdapter.handle(evt)
        if (changed) updateButtonSnapshot(changed, stateAdapter.getState(changed))
      },
    }
  )

  const platform: ButtonPlatform = opts.platform ?? {
    signalWakeup(kind: ButtonKind): void {
      logPlugin.debug(`wakeup source=${kind}-button`)
    },
  }

  const buttons: Record<ButtonKind, ButtonRelayService> = {
    power: new ButtonRelayService('power', { platform, events, clock: opts.clock }),
    sleep: new ButtonRelayService('sleep', { platform, events, clock: opts.clock }),
  }

  app.decorate('buttons', buttons)

  app.post<{ Params: { kind: string }; Body: NotifyBody }>(
    '/api/buttons/:kind/notify',
    async (req, reply) => {
      const { kind } = req.params
      if (!isButtonKind(kind)) {
        reply.code(404)
        return { ok: false, error: `unknown button "${kind}"` }
      }
      const parsed = parseNotifyBody(req.body)
      if (!parsed.ok) {
        reply.code(400)
        return { ok: false, error: parsed.error }
      }
      const delivered = buttons[kind].notify(parsed.event)
      return { ok: true, delivered, pushed: buttons[kind].getPushed() }
    }
  )
}

export default fp(buttonsPlugin, {
  name: 'buttons-plugin',
})
