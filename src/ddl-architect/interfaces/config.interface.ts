import { LogLevel } from '@nestjs/common';

export interface SslConfig {
  rejectUnauthorized: boolean;
}

export interface DatabaseConfig {
  host: string;
  port?: number;
  database: string;
  user: string;
  password: string;
  ssl?: SslConfig;
}

export interface UriConfig {
  uri: string;
  ssl?: SslConfig;
}

export type ConnectionConfig = DatabaseConfig | UriConfig;

export interface DdlArchitectConfig {
  databaseUrl?: string;
  logLevels: LogLevel[];
}
