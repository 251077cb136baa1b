export class WorkoutError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class UnknownWorkoutKindError extends WorkoutError {
  constructor(readonly code: string) {
    super(`Unknown workout kind: ${code}`)
  }
}

export class PayloadArityError extends WorkoutError {
  constructor(
    readonly code: string,
    readonly expected: number,
    readonly received: number,
  ) {
    super(`Workout ${code} expects ${expected} values, received ${received}`)
  }
}

export class NotImplementedError extends WorkoutError {
  constructor(method: string) {
    super(`${method} must be implemented by a concrete training`)
  }
}

export type DivisorQuantity = 'durationHours' | 'heightCm'

export class WorkoutArithmeticError extends WorkoutError {
  constructor(readonly quantity: DivisorQuantity) {
    super(`Division by zero: ${quantity} is 0`)
  }
}
