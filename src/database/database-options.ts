import { join } from 'path';
import { DataSourceOptions } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { ENTITIES } from './entities';

export function buildDataSourceOptions(configService: ConfigService): DataSourceOptions {
  return {
    type: 'postgres',
    host: configService.get('DB_HOST'),
    port: configService.getNumber('DB_PORT', 5432),
    username: configService.get('DB_USERNAME'),
    password: configService.get('DB_PASSWORD'),
    database: configService.get('DB_DATABASE'),
    entities: ENTITIES,
    migrations: [join(__dirname, '..', 'migrations', '*{.ts,.js}')],
    // Schema changes go through migrations only.
    synchronize: false,
    logging: configService.getOptional('NODE_ENV') === 'development',
    ssl: configService.getBoolean('DB_SSL', false),
  };
}
