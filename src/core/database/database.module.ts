import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule, TypeOrmModuleOptions } from '@nestjs/typeorm';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../logger/logger.config';
import { ENTITIES } from './entities';

const IN_MEMORY = ':memory:';

export function buildDatabaseOptions(
  configService: ConfigService,
): TypeOrmModuleOptions {
  const type = configService.get<string>('DATABASE_TYPE', 'better-sqlite3');
  const synchronize =
    configService.get<string>('DATABASE_SYNCHRONIZE', 'true') === 'true';

  if (type === 'postgres') {
    return {
      type: 'postgres',
      url: configService.get<string>('DATABASE_URL'),
      entities: ENTITIES,
      synchronize,
    };
  }

  const database = configService.get<string>('DATABASE_PATH', 'data/app.db');
  if (database !== IN_MEMORY) {
    mkdirSync(dirname(database), { recursive: true });
  }

  return {
    type: 'better-sqlite3',
    database,
    entities: ENTITIES,
    synchronize,
  };
}

@Module({
  imports: [
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const options = buildDatabaseOptions(configService);
        logger().info({ type: options.type }, 'Database configured');
        return options;
      },
    }),
  ],
})
export class DatabaseModule {}
