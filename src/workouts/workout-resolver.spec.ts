import { RaceWalking } from './race-walking'
import { Running } from './running'
import { Swimming } from './swimming'
import { PayloadArityError, UnknownWorkoutKindError } from './workout.errors'
import { expectedArity, isWorkoutCode, resolveWorkout, WORKOUT_CODES } from './workout-resolver'

describe('resolveWorkout', () => {
  it('builds Swimming for SWM with pool fields', () => {
    const training = resolveWorkout('SWM', [720, 1, 80, 25, 40])
    expect(training).toBeInstanceOf(Swimming)
    expect(training).toMatchObject({
      action: 720,
      durationHours: 1,
      weightKg: 80,
      poolLengthM: 25,
      poolLapsCount: 40,
    })
  })

  it('builds Running for RUN', () => {
    const training = resolveWorkout('RUN', [15000, 1, 75])
    expect(training).toBeInstanceOf(Running)
    expect(training.trainingType).toBe('Running')
  })

  it('builds RaceWalking for WLK with height', () => {
    const training = resolveWorkout('WLK', [9000, 1, 75, 180])
    expect(training).toBeInstanceOf(RaceWalking)
    expect(training).toMatchObject({ heightCm: 180 })
  })

  it('throws UnknownWorkoutKindError carrying the code', () => {
    let caught: unknown
    try {
      resolveWorkout('XYZ', [1, 2, 3])
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(UnknownWorkoutKindError)
    expect(caught).toMatchObject({ code: 'XYZ', name: 'UnknownWorkoutKindError', message: 'Unknown workout kind: XYZ' })
  })

  it('treats codes as case sensitive', () => {
    expect(() => resolveWorkout('run', [15000, 1, 75])).toThrow(UnknownWorkoutKindError)
  })

  it('does not resolve inherited object keys', () => {
    expect(() => resolveWorkout('toString', [])).toThrow(UnknownWorkoutKindError)
  })

  it('throws PayloadArityError for too few values', () => {
    expect(() => resolveWorkout('RUN', [15000, 1])).toThrow(new PayloadArityError('RUN', 3, 2))
  })

  it('throws PayloadArityError for too many values', () => {
    let caught: unknown
    try {
      resolveWorkout('WLK', [9000, 1, 75, 180, 5])
    } catch (err) {
      caught = err
    }
    expect(caught).toMatchObject({
      code: 'WLK',
      expected: 4,
      received: 5,
      message: 'Workout WLK expects 4 values, received 5',
    })
  })
})

describe('workout codes', () => {
  it('lists every supported code with its arity', () => {
    expect(WORKOUT_CODES).toEqual(['SWM', 'RUN', 'WLK'])
    expect(WORKOUT_CODES.map(expectedArity)).toEqual([5, 3, 4])
  })

  it('recognises only the supported codes', () => {
    expect(isWorkoutCode('SWM')).toBe(true)
    expect(isWorkoutCode('BIK')).toBe(false)
  })
})
