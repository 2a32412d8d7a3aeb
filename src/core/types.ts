/**
 * Core type definitions for csv2json-mcp
 */

import { LogLevel } from './logger.js';

export type TransportMode = 'stdio' | 'http';

export interface TransportConfig {
  mode: TransportMode;
  host: string;
  port: number;
  /** HTTP endpoint path for the Streamable HTTP transport */
  path: string;
}

export interface Csv2JsonConfig {
  server: {
    name: string;
    version: string;
  };
  transport: TransportConfig;
  logging: {
    level: LogLevel;
  };
}

export type Csv2JsonConfigOverrides = {
  [K in keyof Csv2JsonConfig]?: Partial<Csv2JsonConfig[K]>;
};
