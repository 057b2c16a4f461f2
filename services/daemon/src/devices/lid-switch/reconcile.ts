import type { LidInitPolicy, LidReport, LidSnapshot, LidState } from './types'

export interface LidDecision {
  /** Reports to deliver, in order. Empty when nothing is delivered. */
  reports: LidReport[]
  /** Same value held longer than the report interval. */
  nonCompliant: boolean
  /** State after the decision; identical to the input when nothing is delivered. */
  next: LidSnapshot
}

/**
 * Debounce/compensation decision for one observed lid value.
 *
 * Under `ignore`, a repeat of the last value is delivered only after it has
 * been held past `intervalMs`, and lastReportedAt only moves on delivery.
 * A held "closed" is preceded by an "open" complement so switch consumers
 * that drop redundant values still see it. A held "open" never gets a
 * complement: only "closed" is trusted from non-compliant firmware.
 */
export function reconcileLidReport(
  snapshot: LidSnapshot,
  observed: LidState,
  now: number,
  policy: LidInitPolicy,
  intervalMs: number
): LidDecision {
  const changed = observed !== snapshot.lastReportedState
  const decayed = now - snapshot.lastReportedAt > intervalMs

  let doUpdate = policy !== 'ignore' || changed
  let nonCompliant = false
  const reports: LidReport[] = []

  if (!changed && decayed) {
    nonCompliant = true

    if (policy === 'ignore') {
      doUpdate = true
      if (observed === 'closed') {
        reports.push({ state: 'open', synthetic: true })
      }
    }
  }

  if (!doUpdate) {
    return { reports, nonCompliant, next: snapshot }
  }

  reports.push({ state: observed, synthetic: false })
  return {
    reports,
    nonCompliant,
    next: { lastReportedState: observed, lastReportedAt: now },
  }
}
