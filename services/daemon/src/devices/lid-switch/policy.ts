import { DEFAULT_LID_POLICY, LID_QUIRKS, findQuirk } from './quirks'
import {
  LID_INIT_POLICIES,
  type LidInitPolicy,
  type LidQuirk,
  type PolicyError,
  type Result,
  type SystemIdentity,
} from './types'

export function isLidInitPolicy(v: unknown): v is LidInitPolicy {
  return typeof v === 'string' && LID_INIT_POLICIES.some((p) => p === v)
}

const ALLOWED = LID_INIT_POLICIES.join(', ')

export interface PolicyResolution {
  policy: LidInitPolicy
  source: 'forced' | 'quirk' | 'default'
  quirk: LidQuirk | null
}

/**
 * Process-wide initial-state policy.
 *
 * May be forced before resolution; resolved exactly once (forced value, else
 * quirk table, else `method`) and immutable afterwards. The resolved value is
 * handed to the lid engine explicitly rather than read from here.
 */
export class LidPolicyConfig {
  private forced: LidInitPolicy | null = null
  private resolution: PolicyResolution | null = null
  private readonly quirks: readonly LidQuirk[]

  constructor(opts: { quirks?: readonly LidQuirk[] } = {}) {
    this.quirks = opts.quirks ?? LID_QUIRKS
  }

  public force(name: string): Result<LidInitPolicy, PolicyError> {
    const value = name.trim().toLowerCase()

    if (!isLidInitPolicy(value)) {
      return {
        ok: false,
        error: {
          kind: 'invalid-policy-name',
          message: `unknown lid init state "${name}" (allowed: ${ALLOWED})`,
          value: name,
        },
      }
    }

    if (this.resolution) {
      return {
        ok: false,
        error: {
          kind: 'policy-locked',
          message: `lid init state already resolved to "${this.resolution.policy}" (allowed before resolution: ${ALLOWED})`,
          policy: this.resolution.policy,
        },
      }
    }

    this.forced = value
    return { ok: true, value }
  }

  public resolve(identity: SystemIdentity): PolicyResolution {
    if (this.resolution) return this.resolution

    if (this.forced) {
      this.resolution = { policy: this.forced, source: 'forced', quirk: null }
      return this.resolution
    }

    const quirk = findQuirk(identity, this.quirks)
    this.resolution = quirk
      ? { policy: quirk.policy, source: 'quirk', quirk }
      : { policy: DEFAULT_LID_POLICY, source: 'default', quirk: null }
    return this.resolution
  }

  public isResolved(): boolean {
    return this.resolution !== null
  }

  /** Resolved policy, else the forced one, else null. */
  public current(): LidInitPolicy | null {
    return this.resolution?.policy ?? this.forced
  }

  /** e.g. `ignore open [method] disabled` */
  public describe(): string {
    const active = this.current()
    return LID_INIT_POLICIES.map((p) => (p === active ? `[${p}]` : p)).join(' ')
  }
}
