import { z } from 'zod'
import type { SensorPackage } from '../types/workout.types'

export const sensorPackageSchema = z.object({
  code: z.string().min(1),
  payload: z.array(z.number().finite()),
}) satisfies z.ZodType<SensorPackage>

export const sensorPackagesSchema = z.array(sensorPackageSchema)
