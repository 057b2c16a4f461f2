import fs from 'node:fs'
import path from 'node:path'
import { config as dotenvConfig } from 'dotenv'
import type { FastifyInstance } from 'fastify'
import { buildApp } from './app.js'
import { errorMessage } from './core/sinks.js'
import {
    createLogger,
    LogChannel
} from '@lidwatch/logging'

/**
 * Load environment variables with a clear precedence:
 *   1) .env
 *   2) .env.{NODE_ENV}
 *   3) .env.local
 * Later files override earlier ones.
 */
(function loadEnv() {
    const cwd = process.cwd()
    const env = String(process.env.NODE_ENV || 'development')
    const files = [
        path.resolve(cwd, '.env'),
        path.resolve(cwd, `.env.${env}`),
        path.resolve(cwd, '.env.local')
    ]

    for (const file of files) {
        if (fs.existsSync(file)) {
            dotenvConfig({ path: file, override: true })
        }
    }
})()

async function start() {
    const { channel } = createLogger('daemon')
    const logDaemon = channel(LogChannel.daemon)

    const PORT = Number(process.env.API_PORT ?? 3070)
    const HOST = process.env.API_HOST ?? '127.0.0.1'

    let app: FastifyInstance | null = null

    try {
        app = buildApp()
        await app.listen({ port: PORT, host: HOST })

        const env = process.env.NODE_ENV ?? 'development'
        logDaemon.info(`listening host=${HOST} port=${PORT} env=${env}`)
        logDaemon.info('lid config', {
            initState: app.lidPolicy.describe(),
            bound: app.lidSensors.current() !== null,
        })

        // Graceful shutdown
        const shutdown = async (signal: NodeJS.Signals) => {
            if (!app) process.exit(0)
            try {
                logDaemon.info(`received ${signal}, shutting down`)
                await app.close()
                logDaemon.info('daemon closed')
                process.exit(0)
            } catch (err) {
                logDaemon.error('error during shutdown', { err: errorMessage(err) })
                process.exit(1)
            }
        }
        process.on('SIGINT', () => void shutdown('SIGINT'))
        process.on('SIGTERM', () => void shutdown('SIGTERM'))
    } catch (err) {
        logDaemon.error(`failed to start err="${errorMessage(err)}"`)
        try {
            await app?.close()
        } catch (closeErr) {
            logDaemon.warn('error closing after failed start', { err: errorMessage(closeErr) })
        }
        process.exit(1)
    }
}

void start()
