import { divide, M_IN_KM, Training } from './training'

const CALORIES_MEAN_SPEED_SHIFT = 1.1
const CALORIES_WEIGHT_MULTIPLIER = 2

export class Swimming extends Training {
  readonly trainingType = 'Swimming'
  protected readonly stepLengthKm: number = 1.38

  constructor(
    action: number,
    durationHours: number,
    weightKg: number,
    readonly poolLengthM: number,
    readonly poolLapsCount: number,
  ) {
    super(action, durationHours, weightKg)
  }

  // Speed comes from pool geometry, not from stroke count
  getMeanSpeedKmh(): number {
    return divide((this.poolLengthM * this.poolLapsCount) / M_IN_KM, this.durationHours, 'durationHours')
  }

  getSpentCaloriesKcal(): number {
    return (this.getMeanSpeedKmh() + CALORIES_MEAN_SPEED_SHIFT) * CALORIES_WEIGHT_MULTIPLIER * this.weightKg
  }
}
