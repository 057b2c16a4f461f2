import { LidSwitchService } from './LidSwitchService'
import type {
  BindError,
  LidPlatform,
  LidSwitchConfig,
  LidSwitchEventSink,
  Result,
} from './types'

/**
 * Holds the one authoritative lid sensor. A second bind is rejected and the
 * first sensor stays authoritative; `disabled` rejects every bind.
 */
export class LidSensorRegistry {
  private sensor: LidSwitchService | null = null

  public bind(
    cfg: LidSwitchConfig,
    deps: { platform: LidPlatform; events: LidSwitchEventSink; clock?: () => number }
  ): Result<LidSwitchService, BindError> {
    if (cfg.policy === 'disabled') {
      return {
        ok: false,
        error: { kind: 'sensor-disabled', message: 'lid sensor disabled by init state policy' },
      }
    }

    if (this.sensor) {
      return {
        ok: false,
        error: { kind: 'duplicate-sensor', message: 'more than one lid device found' },
      }
    }

    this.sensor = new LidSwitchService(cfg, deps)
    return { ok: true, value: this.sensor }
  }

  public async unbind(): Promise<void> {
    const s = this.sensor
    this.sensor = null
    if (s) await s.close()
  }

  public current(): LidSwitchService | null {
    return this.sensor
  }
}
