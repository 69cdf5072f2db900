import fp from 'fastify-plugin';
import type { Weekday } from '@crewplan/shared';

export const DEFAULT_DATABASE_URL = '/app/data/crewplan.db';

const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

// Type-safe configuration interface
export interface AppConfig {
  port: number;
  host: string;
  databaseUrl: string;
  logLevel: LogLevel;
  nodeEnv: string;
  trustProxy: boolean;
  /** Weekly days off for tasks without an assignee calendar. */
  defaultDaysOff: Weekday[];
  /** Candidate start dates tried when searching for an assignee's free window. */
  availabilityHorizonDays: number;
}

// Type augmentation: makes fastify.config available across all routes/plugins
declare module 'fastify' {
  interface FastifyInstance {
    config: AppConfig;
  }
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function isWeekday(value: number): value is Weekday {
  return Number.isInteger(value) && value >= 1 && value <= 7;
}

/**
 * Pure function to load and validate configuration from environment variables.
 * This function reads environment variables and returns a validated AppConfig object.
 *
 * @param env - Environment variables object (e.g., process.env)
 * @returns Validated AppConfig
 * @throws Error if configuration is invalid (lists all validation errors)
 */
export function loadConfig(env: Record<string, string | undefined>): AppConfig {
  const errors: string[] = [];

  // Helper to treat empty strings as undefined
  const getValue = (key: string): string | undefined => {
    const value = env[key];
    return value === '' ? undefined : value;
  };

  // Parse and validate PORT
  const portStr = getValue('PORT') ?? '3000';
  const port = parseInt(portStr, 10);
  if (isNaN(port)) {
    errors.push(`PORT must be a valid number, got: ${portStr}`);
  } else if (port < 0 || port > 65535) {
    errors.push(`PORT must be in range 0-65535, got: ${port}`);
  }

  // HOST (simple string, no validation)
  const host = getValue('HOST') ?? '0.0.0.0';

  // DATABASE_URL (simple string, no validation)
  const databaseUrl = getValue('DATABASE_URL') ?? DEFAULT_DATABASE_URL;

  // Parse and validate LOG_LEVEL
  const logLevelStr = (getValue('LOG_LEVEL') ?? 'info').toLowerCase();
  let logLevel: LogLevel = 'info';
  if (isLogLevel(logLevelStr)) {
    logLevel = logLevelStr;
  } else {
    errors.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got: ${getValue('LOG_LEVEL')}`);
  }

  // NODE_ENV (simple string, no validation)
  const nodeEnv = getValue('NODE_ENV') ?? 'production';

  // Parse TRUST_PROXY (boolean, default false)
  const trustProxyStr = (getValue('TRUST_PROXY') ?? 'false').toLowerCase();
  let trustProxy: boolean;
  if (trustProxyStr === 'true') {
    trustProxy = true;
  } else if (trustProxyStr === 'false') {
    trustProxy = false;
  } else {
    errors.push(`TRUST_PROXY must be 'true' or 'false', got: ${getValue('TRUST_PROXY')}`);
    trustProxy = false; // Default fallback
  }

  // Parse DEFAULT_DAYS_OFF (comma-separated ISO weekdays, default Saturday and Sunday)
  const daysOffStr = getValue('DEFAULT_DAYS_OFF') ?? '6,7';
  const defaultDaysOff: Weekday[] = [];
  let daysOffValid = true;
  for (const part of daysOffStr.split(',')) {
    const day = Number(part.trim());
    if (part.trim() === '' || !isWeekday(day)) {
      errors.push(`DEFAULT_DAYS_OFF must list weekdays 1-7, got: ${daysOffStr}`);
      daysOffValid = false;
      break;
    }
    if (!defaultDaysOff.includes(day)) defaultDaysOff.push(day);
  }
  if (daysOffValid && defaultDaysOff.length === 7) {
    errors.push(`DEFAULT_DAYS_OFF must leave at least one working day, got: ${daysOffStr}`);
  }
  defaultDaysOff.sort((a, b) => a - b);

  // Parse and validate AVAILABILITY_HORIZON_DAYS
  const horizonStr = getValue('AVAILABILITY_HORIZON_DAYS') ?? '60';
  const availabilityHorizonDays = parseInt(horizonStr, 10);
  if (isNaN(availabilityHorizonDays)) {
    errors.push(`AVAILABILITY_HORIZON_DAYS must be a valid number, got: ${horizonStr}`);
  } else if (availabilityHorizonDays <= 0) {
    errors.push(`AVAILABILITY_HORIZON_DAYS must be greater than 0, got: ${availabilityHorizonDays}`);
  }

  // If there are any validation errors, throw a single error listing all of them
  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n  - ${errors.join('\n  - ')}`);
  }

  return {
    port,
    host,
    databaseUrl,
    logLevel,
    nodeEnv,
    trustProxy,
    defaultDaysOff,
    availabilityHorizonDays,
  };
}

export default fp(
  async function configPlugin(fastify) {
    // Load and validate configuration
    const config = loadConfig(process.env);

    fastify.log.info(config, 'Configuration loaded');

    // Decorate Fastify instance with the config
    fastify.decorate('config', config);
  },
  {
    name: 'config',
  },
);
