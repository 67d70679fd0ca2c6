import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { HandbookService } from './modules/handbook/handbook.service';

const SAMPLE_QUERY = "What is Contoso's vacation policy?";

async function main() {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['error', 'warn'],
  });
  try {
    const answer = await app.get(HandbookService).queryHandbook(SAMPLE_QUERY);
    console.log(answer);
  } finally {
    await app.close();
  }
}

main().catch((error: unknown) => {
  Logger.error(error, 'Cli');
  process.exit(1);
});
