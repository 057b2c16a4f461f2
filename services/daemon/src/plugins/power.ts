// services/daemon/src/plugins/power.ts

import type { FastifyInstance, FastifyPluginAsync } from 'fastify'
import fp from 'fastify-plugin'

import { createLogger, LogChannel } from '@lidwatch/logging'

import { setPowerSuspended } from '../core/state.js'

/* -------------------------------------------------------------------------- */
/*  Suspend/resume fan-out                                                    */
/*                                                                            */
/*  Buttons are gated while suspended. The lid engine only records suspend;   */
/*  on resume it rebaselines from a fresh raw read and re-applies its policy. */
/* -------------------------------------------------------------------------- */

const powerPlugin: FastifyPluginAsync = async (app: FastifyInstance) => {
  const { channel } = createLogger('power', app.clientBuf)
  const logPower = channel(LogChannel.power)

  let suspended = false

  app.post('/api/power/suspend', async () => {
    if (suspended) return { ok: true, suspended, changed: false }
    suspended = true
    logPower.info('suspending')

    app.buttons.power.suspend()
    app.buttons.sleep.suspend()
    await app.lidSensors.current()?.suspend()

    setPowerSuspended(true)
    return { ok: true, suspended, changed: true }
  })

  app.post('/api/power/resume', async () => {
    if (!suspended) return { ok: true, suspended, changed: false }
    suspended = false
    logPower.info('resuming')

    app.buttons.power.resume()
    app.buttons.sleep.resume()
    await app.lidSensors.current()?.resume()

    setPowerSuspended(false)
    return { ok: true, suspended, changed: true }
  })
}

export default fp(powerPlugin, {
  name: 'power-plugin',
  dependencies: ['lid-switch-plugin', 'buttons-plugin'],
})
