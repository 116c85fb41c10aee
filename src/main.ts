import 'reflect-metadata';
import { LogLevel } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { writeFile } from 'fs/promises';
import { AppModule } from './app.module';
import { InsightsService } from './modules/insights/insights.service';

async function bootstrap() {
  // With no output path the report goes to stdout, so only errors are logged there.
  const outputPath = process.argv[2];
  const logger: LogLevel[] = outputPath ? ['log', 'error', 'warn'] : ['error'];
  const app = await NestFactory.createApplicationContext(AppModule, { logger });

  try {
    const insightsService = app.get(InsightsService);
    const report = await insightsService.report();
    const json = `${JSON.stringify(report, null, 2)}\n`;
    if (outputPath) {
      await writeFile(outputPath, json, 'utf-8');
    } else {
      process.stdout.write(json);
    }
  } finally {
    await app.close();
  }
}

bootstrap().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
