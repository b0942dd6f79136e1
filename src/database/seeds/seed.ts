import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { SeedModule } from './seed.module';
import { SeedService } from './seed.service';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(SeedModule, {
    logger: ['log', 'error', 'warn'],
  });

  const seedService = app.get(SeedService);
  const seedFile = resolve(process.argv[2] ?? 'seed-data.json');

  try {
    const data = await seedService.parse(
      JSON.parse(await readFile(seedFile, 'utf8')),
    );
    await seedService.seed(data);
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  console.error('Seeding failed:', error);
  process.exit(1);
});
