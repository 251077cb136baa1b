import { Injectable, Logger } from '@nestjs/common'
import type { SensorPackage, WorkoutBatchResult, WorkoutReport } from '../types/workout.types'
import { resolveWorkout } from '../workouts/workout-resolver'
import { renderMessage } from './workout-summary-presenter'

@Injectable()
export class WorkoutSummaryService {
  private readonly logger = new Logger(WorkoutSummaryService.name)

  summarize(code: string, payload: readonly number[]): WorkoutReport {
    const summary = resolveWorkout(code, payload).buildSummary()
    this.logger.debug(`${code} [${payload.join(', ')}] -> ${summary.trainingType}`)

    return {
      code,
      summary,
      message: renderMessage(summary),
    }
  }

  /**
   * Each package is computed on its own; a failing package is reported in place
   * and the rest of the batch still runs.
   */
  summarizeAll(packages: readonly SensorPackage[]): WorkoutBatchResult[] {
    return packages.map((pkg): WorkoutBatchResult => {
      try {
        return { ok: true, ...this.summarize(pkg.code, pkg.payload) }
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err))
        this.logger.warn(`Package ${pkg.code} skipped: ${error.message}`)
        return { ok: false, code: pkg.code, error }
      }
    })
  }
}
