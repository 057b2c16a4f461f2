import type { LidInitPolicy, LidQuirk, SystemIdentity } from './types'

/* -------------------------------------------------------------------------- */
/*  Per-machine initial-state overrides                                        */
/*                                                                            */
/*  Keep sorted alphabetically by vendor and model. First match wins.         */
/* -------------------------------------------------------------------------- */

export const LID_QUIRKS: readonly LidQuirk[] = [
  {
    label: 'GP-electronic T701: lid method reads a floating GPIO',
    matches: { sysVendor: 'Insyde', productName: 'T701', biosVersion: 'BYT70A.YNCHENG.WIN.007' },
    policy: 'disabled',
  },
  {
    label: 'Nextbook Ares 8A: lid method always reports closed',
    matches: { sysVendor: 'Insyde', productName: 'CherryTrail', biosVersion: 'M882' },
    policy: 'disabled',
  },
  {
    label: 'Lenovo Yoga 9 14ITL5: initial notification never arrives',
    matches: { sysVendor: 'LENOVO', productName: '82BG' },
    policy: 'open',
  },
  {
    label: 'Medion Akoya E2215T: notifies on close only, method always closed',
    matches: { sysVendor: 'MEDION', productName: 'E2215T' },
    policy: 'open',
  },
  {
    label: 'Medion Akoya E2228T: notifies on close only, method always closed',
    matches: { sysVendor: 'MEDION', productName: 'E2228T' },
    policy: 'open',
  },
  {
    label: 'Razer Blade Stealth 13 (late 2019): notifies on close only, method always closed',
    matches: { sysVendor: 'Razer', productName: 'Razer Blade Stealth 13 Late 2019' },
    policy: 'open',
  },
]

export const DEFAULT_LID_POLICY: LidInitPolicy = 'method'

const IDENTITY_FIELDS: readonly (keyof SystemIdentity)[] = ['sysVendor', 'productName', 'biosVersion']

function fieldMatches(expected: string | undefined, actual: string): boolean {
  if (expected === undefined) return true
  return expected.trim() === actual.trim()
}

export function quirkMatches(quirk: LidQuirk, identity: SystemIdentity): boolean {
  return IDENTITY_FIELDS.every((f) => fieldMatches(quirk.matches[f], identity[f]))
}

export function findQuirk(
  identity: SystemIdentity,
  table: readonly LidQuirk[] = LID_QUIRKS
): LidQuirk | null {
  return table.find((q) => quirkMatches(q, identity)) ?? null
}

export function resolveQuirkPolicy(
  identity: SystemIdentity,
  table: readonly LidQuirk[] = LID_QUIRKS
): LidInitPolicy {
  return findQuirk(identity, table)?.policy ?? DEFAULT_LID_POLICY
}
