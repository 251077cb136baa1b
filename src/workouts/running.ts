import { M_IN_KM, MIN_IN_H, Training } from './training'

const CALORIES_MEAN_SPEED_MULTIPLIER = 18
const CALORIES_MEAN_SPEED_SHIFT = 20

export class Running extends Training {
  readonly trainingType = 'Running'

  // Goes negative below ~1.1 km/h; returned unclamped
  getSpentCaloriesKcal(): number {
    return (
      ((CALORIES_MEAN_SPEED_MULTIPLIER * this.getMeanSpeedKmh() - CALORIES_MEAN_SPEED_SHIFT) *
        this.weightKg) /
      M_IN_KM *
      this.durationHours *
      MIN_IN_H
    )
  }
}
