import { Module } from '@nestjs/common'
import { WorkoutSummaryService } from './workout-summary.service'

@Module({
  providers: [WorkoutSummaryService],
  exports: [WorkoutSummaryService],
})
export class WorkoutSummaryModule {}
