import 'reflect-metadata'
import { Logger } from '@nestjs/common'
import { NestFactory } from '@nestjs/core'
import { AppModule } from './app.module'
import { readAppConfig } from './config/app-config'
import { WorkoutSummaryService } from './workout-summary/workout-summary.service'

async function bootstrap() {
  const config = readAppConfig()
  const app = await NestFactory.createApplicationContext(AppModule, { logger: config.logLevels })

  try {
    const results = app.get(WorkoutSummaryService).summarizeAll(config.packages)
    for (const result of results) {
      if (result.ok) console.log(result.message)
    }
    if (results.some((result) => !result.ok)) {
      process.exitCode = 1
    }
  } finally {
    await app.close()
  }
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(err instanceof Error ? err.message : String(err))
  process.exitCode = 1
})
