import type { TrainingType, WorkoutSummary } from '../types/workout.types'
import type { DivisorQuantity } from './workout.errors'
import { NotImplementedError, WorkoutArithmeticError } from './workout.errors'

export const M_IN_KM = 1000
export const MIN_IN_H = 60

export function divide(value: number, divisor: number, quantity: DivisorQuantity): number {
  if (divisor === 0) throw new WorkoutArithmeticError(quantity)
  return value / divisor
}

/**
 * Base training built from tracker counters.
 * Distance and mean speed are shared; every concrete training brings its own calorie formula.
 */
export abstract class Training {
  abstract readonly trainingType: TrainingType

  /** Distance covered by one action (step or stroke), km */
  protected readonly stepLengthKm: number = 0.65

  constructor(
    readonly action: number,
    readonly durationHours: number,
    readonly weightKg: number,
  ) {}

  getDistanceKm(): number {
    return (this.action * this.stepLengthKm) / M_IN_KM
  }

  getMeanSpeedKmh(): number {
    return divide(this.getDistanceKm(), this.durationHours, 'durationHours')
  }

  getSpentCaloriesKcal(): number {
    throw new NotImplementedError(`${this.trainingType}.getSpentCaloriesKcal`)
  }

  buildSummary(): WorkoutSummary {
    return Object.freeze({
      trainingType: this.trainingType,
      durationHours: this.durationHours,
      distanceKm: this.getDistanceKm(),
      meanSpeedKmh: this.getMeanSpeedKmh(),
      caloriesKcal: this.getSpentCaloriesKcal(),
    })
  }
}
