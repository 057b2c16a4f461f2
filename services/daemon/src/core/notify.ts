// services/daemon/src/core/notify.ts

export type NotifyBody = { event?: unknown } | undefined

export type ParsedNotify =
    | { ok: true; event: number | undefined }
    | { ok: false; error: string }

/** Notification ingress body: `{ event?: integer }`; absent means status change. */
export function parseNotifyBody(body: NotifyBody): ParsedNotify {
    const raw = body?.event
    if (raw === undefined) return { ok: true, event: undefined }
    if (typeof raw !== 'number' || !Number.isInteger(raw) || raw < 0) {
        return { ok: false, error: 'event (non-negative integer) expected' }
    }
    return { ok: true, event: raw }
}
