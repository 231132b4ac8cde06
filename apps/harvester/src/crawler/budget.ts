/**
 * Per-run work budget.
 *
 * Two monotonic counters with hard caps: records newly persisted, and detail
 * calls made. Reservations are synchronous, so concurrent workers sharing one
 * budget cannot run past a cap. A new-record reservation counts toward the
 * cap while pending and is either committed or cancelled.
 */

export interface RunBudgetLimits {
  maxNewRecords: number
  maxDetailCalls: number
}

export interface BudgetReservation {
  commit(): void
  cancel(): void
}

export class RunBudget {
  private persisted = 0
  private pending = 0
  private detailCallsMade = 0

  constructor(private readonly limits: RunBudgetLimits) {}

  get newRecords(): number {
    return this.persisted
  }

  get detailCalls(): number {
    return this.detailCallsMade
  }

  get newRecordsExhausted(): boolean {
    return this.persisted + this.pending >= this.limits.maxNewRecords
  }

  get detailCallsExhausted(): boolean {
    return this.detailCallsMade >= this.limits.maxDetailCalls
  }

  /**
   * Claim one new-record slot, or null when the cap is reached.
   */
  reserveNewRecord(): BudgetReservation | null {
    if (this.newRecordsExhausted) return null
    this.pending++

    let settled = false
    return {
      commit: () => {
        if (settled) return
        settled = true
        this.pending--
        this.persisted++
      },
      cancel: () => {
        if (settled) return
        settled = true
        this.pending--
      },
    }
  }

  /**
   * Count one detail call. Returns false, without counting, once the cap is reached.
   */
  tryReserveDetailCall(): boolean {
    if (this.detailCallsExhausted) return false
    this.detailCallsMade++
    return true
  }

  snapshot(): { newRecords: number; detailCalls: number; limits: RunBudgetLimits } {
    return { newRecords: this.persisted, detailCalls: this.detailCallsMade, limits: { ...this.limits } }
  }
}
