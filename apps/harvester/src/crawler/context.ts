/**
 * Per-run context passed explicitly to every crawl component.
 */

import { randomUUID } from 'node:crypto'
import type { ILogger } from '@tilecrawl/logger'
import { RunBudget } from './budget.js'
import type { Clock, CrawlConfig, Sleep, StopReason } from './types.js'
import { defaultSleep } from './fetch/retrying-fetcher.js'

/**
 * Cooperative cancellation. Checked between units of work, never mid-request.
 */
export class StopSignal {
  private stopReason: StopReason | null = null

  get stopped(): boolean {
    return this.stopReason !== null
  }

  get reason(): StopReason | null {
    return this.stopReason
  }

  /** First reason wins */
  request(reason: Exclude<StopReason, 'completed'>): void {
    if (this.stopReason === null) {
      this.stopReason = reason
    }
  }
}

export interface CrawlRunContext {
  runId: string
  config: CrawlConfig
  budget: RunBudget
  stop: StopSignal
  clock: Clock
  sleep: Sleep
  /** Uniform [0, 1) */
  random: () => number
  logger: ILogger
}

export interface RunContextOptions {
  config: CrawlConfig
  logger: ILogger
  runId?: string
  clock?: Clock
  sleep?: Sleep
  random?: () => number
}

export function createRunContext(options: RunContextOptions): CrawlRunContext {
  const runId = options.runId ?? randomUUID()
  return {
    runId,
    config: options.config,
    budget: new RunBudget({
      maxNewRecords: options.config.maxNewRecordsPerRun,
      maxDetailCalls: options.config.maxDetailEnrichmentsPerRun,
    }),
    stop: new StopSignal(),
    clock: options.clock ?? (() => new Date()),
    sleep: options.sleep ?? defaultSleep,
    random: options.random ?? Math.random,
    logger: options.logger.child({ runId }),
  }
}

/**
 * Random pause within the configured inter-request range.
 */
export function interRequestDelayMs(ctx: CrawlRunContext): number {
  const { min, max } = ctx.config.interRequestDelayRange
  return Math.round((min + ctx.random() * (max - min)) * 1000)
}

export async function pause(ctx: CrawlRunContext): Promise<void> {
  const ms = interRequestDelayMs(ctx)
  if (ms > 0) {
    await ctx.sleep(ms)
  }
}
