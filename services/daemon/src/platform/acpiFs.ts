// services/daemon/src/platform/acpiFs.ts
import { promises as fs } from 'node:fs'
import path from 'node:path'

import type {
  LidPlatform,
  LidState,
  SensorReadResult,
  SystemIdentity,
} from '../devices/lid-switch/types'

const STATE_LINE = /^\s*state:\s*(open|closed)\s*$/m

export function parseLidStateText(text: string): LidState | null {
  const m = STATE_LINE.exec(text)
  if (!m) return null
  return m[1] === 'open' ? 'open' : 'closed'
}

/**
 * Lid platform backed by a procfs-style state file
 * (`state:      open` / `state:      closed`).
 */
export class FsLidPlatform implements LidPlatform {
  private readonly statePath: string
  private readonly onWakeup: () => void

  constructor(opts: { statePath: string; onWakeup?: () => void }) {
    this.statePath = opts.statePath
    this.onWakeup = opts.onWakeup ?? (() => {})
  }

  public async queryLid(): Promise<SensorReadResult> {
    let text: string
    try {
      text = await fs.readFile(this.statePath, 'utf8')
    } catch (err) {
      return {
        ok: false,
        error: {
          kind: 'sensor-unavailable',
          message: `cannot read ${this.statePath}`,
          detail: err instanceof Error ? err.message : String(err),
        },
      }
    }

    const state = parseLidStateText(text)
    if (!state) {
      return {
        ok: false,
        error: {
          kind: 'sensor-unavailable',
          message: `unrecognised lid state in ${this.statePath}`,
          detail: text.trim().slice(0, 80),
        },
      }
    }
    return { ok: true, value: state }
  }

  public signalWakeup(): void {
    this.onWakeup()
  }
}

async function readDmiField(dir: string, name: string): Promise<string> {
  try {
    return (await fs.readFile(path.join(dir, name), 'utf8')).trim()
  } catch {
    // absent fields read as empty, which no quirk matches
    return ''
  }
}

export async function readSystemIdentity(dmiDir: string): Promise<SystemIdentity> {
  const [sysVendor, productName, biosVersion] = await Promise.all([
    readDmiField(dmiDir, 'sys_vendor'),
    readDmiField(dmiDir, 'product_name'),
    readDmiField(dmiDir, 'bios_version'),
  ])
  return { sysVendor, productName, biosVersion }
}
