import { describe, expect, it } from 'vitest'
import { reconcileLidReport } from '../reconcile'

describe('reconcileLidReport', () => {
  it('delivers a changed value under every policy', () => {
    for (const policy of ['ignore', 'open', 'method'] as const) {
      const d = reconcileLidReport({ lastReportedState: 'closed', lastReportedAt: 0 }, 'open', 100, policy, 500)
      expect(d.reports).toEqual([{ state: 'open', synthetic: false }])
      expect(d.nonCompliant).toBe(false)
      expect(d.next).toEqual({ lastReportedState: 'open', lastReportedAt: 100 })
    }
  })

  it('re-delivers an unchanged value when the policy is not ignore', () => {
    const d = reconcileLidReport({ lastReportedState: 'closed', lastReportedAt: 0 }, 'closed', 100, 'method', 500)
    expect(d.reports).toEqual([{ state: 'closed', synthetic: false }])
    expect(d.next).toEqual({ lastReportedState: 'closed', lastReportedAt: 100 })
  })

  it('drops an unchanged, undecayed value under ignore and keeps the pair', () => {
    const snapshot = { lastReportedState: 'closed' as const, lastReportedAt: 0 }
    const d = reconcileLidReport(snapshot, 'closed', 500, 'ignore', 500)
    expect(d.reports).toEqual([])
    expect(d.nonCompliant).toBe(false)
    expect(d.next).toBe(snapshot)
  })

  it('prefixes a held closed with a synthetic open once decayed under ignore', () => {
    const d = reconcileLidReport({ lastReportedState: 'closed', lastReportedAt: 0 }, 'closed', 600, 'ignore', 500)
    expect(d.reports).toEqual([
      { state: 'open', synthetic: true },
      { state: 'closed', synthetic: false },
    ])
    expect(d.nonCompliant).toBe(true)
    expect(d.next).toEqual({ lastReportedState: 'closed', lastReportedAt: 600 })
  })

  it('never complements a held open', () => {
    const d = reconcileLidReport({ lastReportedState: 'open', lastReportedAt: 0 }, 'open', 600, 'ignore', 500)
    expect(d.reports).toEqual([{ state: 'open', synthetic: false }])
    expect(d.nonCompliant).toBe(true)
  })

  it('flags non-compliance without a complement outside ignore', () => {
    const d = reconcileLidReport({ lastReportedState: 'closed', lastReportedAt: 0 }, 'closed', 600, 'method', 500)
    expect(d.reports).toEqual([{ state: 'closed', synthetic: false }])
    expect(d.nonCompliant).toBe(true)
  })

  it('treats a zero interval as always decayed after any elapsed time', () => {
    const d = reconcileLidReport({ lastReportedState: 'closed', lastReportedAt: 10 }, 'closed', 11, 'ignore', 0)
    expect(d.reports).toHaveLength(2)
  })
})
