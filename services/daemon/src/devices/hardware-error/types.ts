export type HedListenerResult = 'ok' | 'stop'

/** Called in registration order; returning 'stop' ends the chain. */
export type HedListener = () => HedListenerResult | void

export type HedError = {
  kind: 'duplicate-device'
  message: string
  boundTo: string
}

export interface HedEventSink {
  publish(evt: HedEvent): void
}

export type HedEvent =
  | { kind: 'hed-bound'; at: number; deviceId: string }
  | { kind: 'hed-unbound'; at: number; deviceId: string }
  | { kind: 'hed-notified'; at: number; listenersCalled: number; stopped: boolean }
  | { kind: 'hed-notification-ignored'; at: number; reason: 'unbound' }
  | { kind: 'hed-listener-failed'; at: number; message: string }
