// services/daemon/src/adapters/button.adapter.ts

import type { ButtonEvent, ButtonKind, ButtonStateSlice } from '../devices/button/types'
import { initialButtonSlice } from '../core/state'

export class ButtonStateAdapter {
  private readonly states: Record<ButtonKind, ButtonStateSlice> = {
    power: initialButtonSlice(),
    sleep: initialButtonSlice(),
  }

  /** Returns the button whose slice changed, if any. */
  public handle(evt: ButtonEvent): ButtonKind | null {
    const s = this.states[evt.button]

    switch (evt.kind) {
      case 'button-pressed': {
        s.pushed = evt.pushed
        s.lastPressAt = evt.at
        break
      }
      case 'button-suppressed': {
        s.suppressed += 1
        break
      }
      case 'button-suspend-changed': {
        s.suspended = evt.suspended
        break
      }
      // key edges + unsupported events are logs only
      case 'button-key':
      case 'button-unsupported-event':
      default: {
        return null
      }
    }

    s.updatedAt = Date.now()
    return evt.button
  }

  public getState(kind: ButtonKind): ButtonStateSlice {
    return { ...this.states[kind] }
  }
}
