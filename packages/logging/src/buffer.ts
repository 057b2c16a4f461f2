import {
    type ClientLog,
    type ClientLogBuffer,
    type ClientLogListener
} from './types'

export function makeClientBuffer(limit: number = Number(process.env.CLIENT_LOGS_TO_KEEP ?? 500)): ClientLogBuffer {
    const cap = Number.isFinite(limit) && limit > 0 ? Math.floor(limit) : 500
    const buf: ClientLog[] = []
    const listeners = new Set<ClientLogListener>()

    const push = (log: ClientLog): void => {
        buf.push(log)
        if (buf.length > cap) buf.shift()
        // notify subscribers
        for (const l of listeners) {
            l(log)
        }
    }

    const getLatest = (n: number): ClientLog[] => {
        if (!Number.isFinite(n) || n <= 0) return []
        return buf.slice(-Math.floor(n))
    }

    const subscribe = (listener: ClientLogListener): () => void => {
        listeners.add(listener)
        return () => { listeners.delete(listener) }
    }

    return { push, getLatest, subscribe }
}
