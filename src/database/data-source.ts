// Used by the TypeORM CLI: npm run migration:run
import 'reflect-metadata';
import { DataSource } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { buildDataSourceOptions } from './database-options';

export default new DataSource(buildDataSourceOptions(new ConfigService()));
