import type { SensorPackage } from '../types/workout.types'

export const SAMPLE_PACKAGES: readonly SensorPackage[] = [
  { code: 'SWM', payload: [720, 1, 80, 25, 40] },
  { code: 'RUN', payload: [15000, 1, 75] },
  { code: 'WLK', payload: [9000, 1, 75, 180] },
]
