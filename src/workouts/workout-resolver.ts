import type { WorkoutCode } from '../types/workout.types'
import { RaceWalking } from './race-walking'
import { Running } from './running'
import { Swimming } from './swimming'
import type { Training } from './training'
import { PayloadArityError, UnknownWorkoutKindError } from './workout.errors'

type TrainingFactory = {
  arity: number
  create: (values: readonly number[]) => Training
}

const TRAINING_FACTORIES: Record<WorkoutCode, TrainingFactory> = {
  SWM: {
    arity: 5,
    create: ([action, duration, weight, poolLength, poolLaps]) =>
      new Swimming(action, duration, weight, poolLength, poolLaps),
  },
  RUN: {
    arity: 3,
    create: ([action, duration, weight]) => new Running(action, duration, weight),
  },
  WLK: {
    arity: 4,
    create: ([action, duration, weight, height]) => new RaceWalking(action, duration, weight, height),
  },
}

export const WORKOUT_CODES: readonly WorkoutCode[] = ['SWM', 'RUN', 'WLK']

export function isWorkoutCode(value: string): value is WorkoutCode {
  return WORKOUT_CODES.some((code) => code === value)
}

export function expectedArity(code: WorkoutCode): number {
  return TRAINING_FACTORIES[code].arity
}

/**
 * Builds the training matching a tracker activity code.
 * Payload values are positional: action, duration (h), weight (kg), then variant fields.
 */
export function resolveWorkout(code: string, payload: readonly number[]): Training {
  if (!isWorkoutCode(code)) {
    throw new UnknownWorkoutKindError(code)
  }
  const factory = TRAINING_FACTORIES[code]
  if (payload.length !== factory.arity) {
    throw new PayloadArityError(code, factory.arity, payload.length)
  }
  return factory.create(payload)
}
