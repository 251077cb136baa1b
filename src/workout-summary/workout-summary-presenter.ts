import type { WorkoutSummary } from '../types/workout.types'

const FRACTION_DIGITS = 3

/**
 * Fixed-point rendering with exactly three fractional digits.
 * toFixed switches to exponent notation from 1e21 up, those values are integers anyway.
 */
export function formatFixed3(value: number): string {
  if (Number.isNaN(value)) return 'nan'
  if (!Number.isFinite(value)) return value > 0 ? 'inf' : '-inf'
  if (Math.abs(value) >= 1e21) return `${BigInt(value).toString()}.${'0'.repeat(FRACTION_DIGITS)}`
  if (Object.is(value, -0)) return `-${(0).toFixed(FRACTION_DIGITS)}`
  if (isExactTie(value)) return formatTieHalfEven(value)
  return value.toFixed(FRACTION_DIGITS)
}

/**
 * A double sits exactly halfway between two thousandths only when it is an odd number of sixteenths
 * (k + 0.5) / 1000 = (2k + 1) / 2000, and a binary fraction needs 125 to divide 2k + 1.
 */
function isExactTie(value: number): boolean {
  const sixteenths = Math.abs(value) * 16
  return Number.isInteger(sixteenths) && sixteenths % 2 === 1 && Number.isSafeInteger(Math.abs(value) * 2000)
}

// toFixed rounds ties away from zero; ties go to the even last digit instead
function formatTieHalfEven(value: number): string {
  const lower = (Math.abs(value) * 2000 - 1) / 2
  const thousandths = lower % 2 === 0 ? lower : lower + 1
  const integerPart = Math.floor(thousandths / 1000)
  const fraction = String(thousandths % 1000).padStart(FRACTION_DIGITS, '0')
  return `${value < 0 ? '-' : ''}${integerPart}.${fraction}`
}

export function renderMessage(summary: WorkoutSummary): string {
  return [
    `Тип тренировки: ${summary.trainingType}`,
    `Длительность: ${formatFixed3(summary.durationHours)} ч.`,
    `Дистанция: ${formatFixed3(summary.distanceKm)} км`,
    `Ср. скорость: ${formatFixed3(summary.meanSpeedKmh)} км/ч`,
    `Потрачено ккал: ${formatFixed3(summary.caloriesKcal)}.`,
  ].join('; ')
}
