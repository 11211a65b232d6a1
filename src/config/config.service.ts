import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { Injectable, Logger } from '@nestjs/common';

@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly envConfig: Record<string, string>;

  constructor(overrides?: Record<string, string>) {
    if (overrides) {
      this.envConfig = { ...overrides };
      return;
    }

    // Try to load from .env file first
    const envFile = process.env.NODE_ENV === 'production' ? '.env.production' : '.env.development';

    try {
      this.envConfig = { ...this.processEnv(), ...dotenv.parse(fs.readFileSync(envFile)) };
    } catch (err) {
      this.logger.warn(`Failed to load ${envFile}, using process.env`);
      this.envConfig = this.processEnv();
    }
  }

  private processEnv(): Record<string, string> {
    return Object.fromEntries(
      Object.entries(process.env).filter((entry): entry is [string, string] => entry[1] !== undefined),
    );
  }

  get(key: string): string {
    const value = this.envConfig[key];
    if (value === undefined) {
      throw new Error(`Configuration error: Missing required environment variable ${key}`);
    }
    return value;
  }

  getOptional(key: string): string | undefined {
    return this.envConfig[key];
  }

  getNumber(key: string, fallback: number): number {
    const raw = this.envConfig[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = Number(raw);
    if (!Number.isFinite(parsed)) {
      throw new Error(`Configuration error: ${key} must be numeric, got "${raw}"`);
    }
    return parsed;
  }

  getBoolean(key: string, fallback: boolean): boolean {
    const raw = this.envConfig[key];
    if (raw === undefined || raw.trim() === '') return fallback;
    return ['true', '1', 'yes', 'on'].includes(raw.trim().toLowerCase());
  }
}
