import { Module } from '@nestjs/common'
import { WorkoutSummaryModule } from './workout-summary/workout-summary.module'

@Module({
  imports: [WorkoutSummaryModule],
})
export class AppModule {}
