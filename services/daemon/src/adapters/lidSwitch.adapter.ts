// services/daemon/src/adapters/lidSwitch.adapter.ts

import type {
  LidInitPolicy,
  LidSwitchEvent,
  LidSwitchStateSlice,
} from '../devices/lid-switch/types'
import { initialLidSwitchSlice } from '../core/state'

export class LidSwitchStateAdapter {
  private state: LidSwitchStateSlice

  constructor() {
    this.state = initialLidSwitchSlice()
  }

  public bound(policy: LidInitPolicy, reportIntervalMs: number): void {
    this.state.bound = true
    this.state.policy = policy
    this.state.reportIntervalMs = reportIntervalMs
    this.touch()
  }

  public unbound(policy: LidInitPolicy | null): void {
    this.state = initialLidSwitchSlice()
    this.state.policy = policy
    this.touch()
  }

  public handle(evt: LidSwitchEvent): void {
    switch (evt.kind) {
      case 'lid-switch-reported': {
        this.state.switchState = evt.state
        this.state.lastReportAt = evt.at
        this.state.reports += 1
        if (evt.synthetic) this.state.syntheticReports += 1
        this.touch()
        break
      }

      case 'lid-initialized': {
        this.state.initialized = true
        this.state.policy = evt.policy
        this.touch()
        break
      }

      case 'lid-firmware-noncompliant': {
        this.state.firmwareNonCompliant = true
        this.touch()
        break
      }

      case 'lid-wakeup-signalled': {
        this.state.wakeups += 1
        this.touch()
        break
      }

      case 'lid-suspended': {
        this.state.suspended = true
        this.touch()
        break
      }

      case 'lid-resumed': {
        this.state.suspended = false
        this.touch()
        break
      }

      case 'lid-unbound': {
        this.unbound(this.state.policy)
        break
      }

      case 'lid-report-interval-changed': {
        this.state.reportIntervalMs = evt.reportIntervalMs
        this.touch()
        break
      }

      case 'recoverable-error': {
        this.state.lastError = evt.error
        this.touch()
        break
      }

      case 'lid-notification-dropped': {
        // logs only
        break
      }

      default: {
        break
      }
    }
  }

  public getState(): LidSwitchStateSlice {
    return { ...this.state }
  }

  private touch(): void {
    this.state.updatedAt = Date.now()
  }
}
