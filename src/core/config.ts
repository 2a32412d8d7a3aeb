/**
 * Configuration management for csv2json-mcp
 */

import { readFileSync, existsSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { formatIssues } from './conversion-options.js';
import { createLogger, LOG_LEVELS } from './logger.js';
import { Csv2JsonConfig, Csv2JsonConfigOverrides } from './types.js';

const logger = createLogger('config');

export const CONFIG_PATH_ENV = 'CSV2JSON_MCP_CONFIG';

const DEFAULT_CONFIG: Csv2JsonConfig = {
  server: {
    name: 'csv2json-mcp',
    version: '0.1.0',
  },
  transport: {
    mode: 'stdio',
    host: 'localhost',
    port: 8000,
    path: '/mcp',
  },
  logging: {
    level: 'info',
  },
};

const UserConfigSchema = z.object({
  server: z
    .object({
      name: z.string().min(1),
      version: z.string().min(1),
    })
    .partial()
    .optional(),
  transport: z
    .object({
      mode: z.enum(['stdio', 'http']),
      host: z.string().min(1),
      port: z.number().int().min(1).max(65535),
      path: z.string().startsWith('/'),
    })
    .partial()
    .optional(),
  logging: z
    .object({
      level: z.enum(LOG_LEVELS),
    })
    .partial()
    .optional(),
});

export function defaultConfigPath(): string {
  return (
    process.env[CONFIG_PATH_ENV] || join(homedir(), '.csv2json-mcp', 'config.json')
  );
}

export class ConfigManager {
  private config: Csv2JsonConfig;
  private configPath: string;

  constructor(configPath?: string) {
    this.configPath = configPath || defaultConfigPath();
    this.config = this.loadConfig();
  }

  private loadConfig(): Csv2JsonConfig {
    if (!existsSync(this.configPath)) {
      return DEFAULT_CONFIG;
    }

    try {
      const fileContent = readFileSync(this.configPath, 'utf-8');
      const parsed = UserConfigSchema.safeParse(JSON.parse(fileContent));
      if (!parsed.success) {
        logger.warn(
          `Ignoring invalid config ${this.configPath}: ${formatIssues(parsed.error)}`
        );
        return DEFAULT_CONFIG;
      }
      return this.mergeConfig(DEFAULT_CONFIG, parsed.data);
    } catch (error) {
      logger.warn(`Failed to load config ${this.configPath}, using defaults:`, error);
      return DEFAULT_CONFIG;
    }
  }

  private mergeConfig(
    defaults: Csv2JsonConfig,
    user: Csv2JsonConfigOverrides
  ): Csv2JsonConfig {
    return {
      server: { ...defaults.server, ...user.server },
      transport: { ...defaults.transport, ...user.transport },
      logging: { ...defaults.logging, ...user.logging },
    };
  }

  get(): Csv2JsonConfig {
    return {
      server: { ...this.config.server },
      transport: { ...this.config.transport },
      logging: { ...this.config.logging },
    };
  }

  getPath(): string {
    return this.configPath;
  }

  update(updates: Csv2JsonConfigOverrides): void {
    this.config = this.mergeConfig(this.config, updates);
  }
}
