import { divide, MIN_IN_H, Training } from './training'

const CALORIES_WEIGHT_MULTIPLIER = 0.035
const CALORIES_SPEED_HEIGHT_MULTIPLIER = 0.029

/**
 * Floor of the exact quotient, rounding toward negative infinity.
 * Works from the remainder because the rounded quotient can land on the next integer (1 / 0.1 === 10).
 */
export function floorDiv(value: number, divisor: number): number {
  if (divisor === 0) return divide(value, divisor, 'heightCm')

  const mod = value % divisor
  let div = (value - mod) / divisor
  if (mod !== 0 && divisor < 0 !== mod < 0) {
    div -= 1
  }
  if (div === 0) {
    const quotient = value / divisor
    return quotient < 0 || Object.is(quotient, -0) ? -0 : 0
  }

  const floored = Math.floor(div)
  return div - floored > 0.5 ? floored + 1 : floored
}

export class RaceWalking extends Training {
  readonly trainingType = 'RaceWalking'

  constructor(
    action: number,
    durationHours: number,
    weightKg: number,
    readonly heightCm: number,
  ) {
    super(action, durationHours, weightKg)
  }

  getSpentCaloriesKcal(): number {
    const speedHeightRatio = floorDiv(this.getMeanSpeedKmh() ** 2, this.heightCm)
    return (
      (CALORIES_WEIGHT_MULTIPLIER * this.weightKg +
        speedHeightRatio * CALORIES_SPEED_HEIGHT_MULTIPLIER * this.weightKg) *
      this.durationHours *
      MIN_IN_H
    )
  }
}
