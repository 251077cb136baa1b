export type WorkoutCode = 'SWM' | 'RUN' | 'WLK'
export type TrainingType = 'Running' | 'RaceWalking' | 'Swimming'

export type WorkoutSummary = {
  trainingType: TrainingType
  durationHours: number
  distanceKm: number
  meanSpeedKmh: number
  caloriesKcal: number
}

/** Raw reading from the tracker: activity code plus positional values */
export type SensorPackage = {
  code: string
  payload: number[]
}

export type WorkoutReport = {
  code: string
  summary: WorkoutSummary
  message: string
}

export type WorkoutBatchResult =
  | ({ ok: true } & WorkoutReport)
  | { ok: false; code: string; error: Error }
