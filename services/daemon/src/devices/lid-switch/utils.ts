import { DEFAULT_REPORT_INTERVAL_MS, type LidStatus } from './types'

/* -------------------------------------------------------------------------- */
/*  Env parsing helpers (strict + predictable)                                 */
/* -------------------------------------------------------------------------- */

function envString(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: string
): string {
  const v = env[name]
  if (v == null) return fallback
  const t = v.trim()
  return t.length === 0 ? fallback : t
}

function envInt(
  env: NodeJS.ProcessEnv,
  name: string,
  fallback: number
): number {
  const raw = env[name]
  if (raw == null || raw === '') return fallback
  const n = Number.parseInt(raw, 10)
  return Number.isFinite(n) ? n : fallback
}

export function clampInt(n: number, min: number, max: number): number {
  if (!Number.isFinite(n)) return min
  return Math.max(min, Math.min(max, Math.floor(n)))
}

/* -------------------------------------------------------------------------- */
/*  Lid switch env config                                                      */
/* -------------------------------------------------------------------------- */

export interface LidSwitchEnvConfig {
  /** Forced policy literal from LID_INIT_STATE, unvalidated. */
  forcedPolicy: string | null
  reportIntervalMs: number
  statePath: string
  dmiDir: string
}

export const MAX_REPORT_INTERVAL_MS = 3_600_000

export function buildLidSwitchConfigFromEnv(env: NodeJS.ProcessEnv): LidSwitchEnvConfig {
  const forced = envString(env, 'LID_INIT_STATE', '')

  const reportIntervalMs = clampInt(
    envInt(env, 'LID_REPORT_INTERVAL_MS', DEFAULT_REPORT_INTERVAL_MS),
    0,
    MAX_REPORT_INTERVAL_MS
  )

  return {
    forcedPolicy: forced.length > 0 ? forced : null,
    reportIntervalMs,
    statePath: envString(env, 'LID_STATE_PATH', '/proc/acpi/button/lid/LID0/state'),
    dmiDir: envString(env, 'DMI_ID_DIR', '/sys/class/dmi/id'),
  }
}

/* -------------------------------------------------------------------------- */
/*  Misc helpers used by the service + routes                                  */
/* -------------------------------------------------------------------------- */

/** Monotonic milliseconds; wall-clock jumps never count toward the report interval. */
export function now(): number {
  return performance.now()
}

export function isValidReportInterval(ms: unknown): ms is number {
  return typeof ms === 'number' && Number.isInteger(ms) && ms >= 0 && ms <= MAX_REPORT_INTERVAL_MS
}

/** procfs-style status line */
export function formatLidStatus(status: LidStatus): string {
  return `state:      ${status}\n`
}
