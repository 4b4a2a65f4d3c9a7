import * as fs from 'fs';
import * as path from 'path';
import * as sql from 'mssql';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { Layer } from '../model/tables';
import { errorMessage } from './error-handler';

export type SourceEntity =
  | 'brands'
  | 'categories'
  | 'customers'
  | 'products'
  | 'orders'
  | 'orderItems'
  | 'stores'
  | 'staffs'
  | 'stocks';

export interface ETLConfig {
  database: {
    connectionString: string;
    schemas: Record<Layer, string>;
  };
  inputFiles: {
    directory: string;
  } & Record<SourceEntity, string>;
  quality: {
    countVarianceThreshold: number; // fraction of the raw count
    totalAmountTolerance: number;
  };
  debugMode: boolean;
}

export interface ConfigOverrides {
  database?: {
    connectionString?: string;
    schemas?: Partial<Record<Layer, string>>;
  };
  inputFiles?: Partial<ETLConfig['inputFiles']>;
  quality?: Partial<ETLConfig['quality']>;
  debugMode?: boolean;
}

const DEFAULT_FILES: Record<SourceEntity, string> = {
  brands: 'brands.csv',
  categories: 'categories.csv',
  customers: 'customers.csv',
  products: 'products.csv',
  orders: 'orders.csv',
  orderItems: 'order_items.csv',
  stores: 'stores.csv',
  staffs: 'staffs.csv',
  stocks: 'stocks.csv',
};

const ENV_FILE_KEYS: Record<SourceEntity, string> = {
  brands: 'INPUT_BRANDS',
  categories: 'INPUT_CATEGORIES',
  customers: 'INPUT_CUSTOMERS',
  products: 'INPUT_PRODUCTS',
  orders: 'INPUT_ORDERS',
  orderItems: 'INPUT_ORDER_ITEMS',
  stores: 'INPUT_STORES',
  staffs: 'INPUT_STAFFS',
  stocks: 'INPUT_STOCKS',
};

const appSettingsSchema = z
  .object({
    database: z
      .object({
        connectionString: z.string(),
        schemas: z
          .object({
            raw: z.string(),
            staging: z.string(),
            warehouse: z.string(),
            audit: z.string(),
          })
          .partial(),
      })
      .partial(),
    inputFiles: z
      .object({
        directory: z.string(),
        brands: z.string(),
        categories: z.string(),
        customers: z.string(),
        products: z.string(),
        orders: z.string(),
        orderItems: z.string(),
        stores: z.string(),
        staffs: z.string(),
        stocks: z.string(),
      })
      .partial(),
    quality: z
      .object({
        countVarianceThreshold: z.number().min(0),
        totalAmountTolerance: z.number().min(0),
      })
      .partial(),
    debugMode: z.boolean(),
  })
  .partial();

type AppSettings = z.infer<typeof appSettingsSchema>;

/**
 * Parse a SQL Server connection string into mssql config
 * Format: Server=...;Database=...;User Id=...;Password=...;TrustServerCertificate=...;Encrypt=...;
 */
export function parseConnectionString(connStr: string): Partial<sql.config> {
  const parts: Record<string, string> = {};
  connStr.split(';').forEach(part => {
    const [key, ...valueParts] = part.split('=');
    if (key && valueParts.length > 0) {
      parts[key.trim().toLowerCase()] = valueParts.join('=').trim();
    }
  });

  return {
    server: parts['server'] || parts['data source'],
    database: parts['database'] || parts['initial catalog'],
    user: parts['user id'] || parts['uid'] || parts['user'],
    password: parts['password'] || parts['pwd'],
    options: {
      encrypt: parts['encrypt']?.toLowerCase() !== 'false',
      trustServerCertificate: parts['trustservercertificate']?.toLowerCase() === 'true',
    }
  };
}

function readAppSettings(configPath: string): AppSettings {
  if (!fs.existsSync(configPath)) {
    return {};
  }

  const fileContent = fs.readFileSync(configPath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch (error) {
    throw new Error(`Failed to parse ${path.basename(configPath)}: ${errorMessage(error)}`);
  }

  const result = appSettingsSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new Error(`Invalid ${path.basename(configPath)}: ${issues.join('; ')}`);
  }
  return result.data;
}

function envNumber(name: string): number | undefined {
  const value = process.env[name];
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function envBoolean(name: string): boolean | undefined {
  const value = process.env[name];
  if (value === undefined || value.trim() === '') return undefined;
  return value.toLowerCase() === 'true';
}

function connectionStringFromEnv(): string {
  if (process.env.SQLSERVER) {
    return process.env.SQLSERVER;
  }

  const server = process.env.SQLSERVER_HOST;
  const database = process.env.SQLSERVER_DATABASE;
  const user = process.env.SQLSERVER_USER;
  const password = process.env.SQLSERVER_PASSWORD;

  if (server && database && user && password) {
    return `Server=${server};Database=${database};User Id=${user};Password=${password};TrustServerCertificate=True;Encrypt=True;`;
  }
  return '';
}

/**
 * Load ETL configuration from appsettings.json and environment variables
 *
 * Priority:
 * 1. Explicit overrides (passed as parameter)
 * 2. Environment variables (a .env file in the working directory is read first)
 * 3. appsettings.json
 * 4. Default values
 */
export function loadConfig(overrides?: ConfigOverrides, cwd: string = process.cwd()): ETLConfig {
  dotenv.config({ path: path.join(cwd, '.env') });
  const fileConfig = readAppSettings(path.join(cwd, 'appsettings.json'));

  const fileFor = (entity: SourceEntity): string =>
    process.env[ENV_FILE_KEYS[entity]] || fileConfig.inputFiles?.[entity] || DEFAULT_FILES[entity];

  const config: ETLConfig = {
    database: {
      connectionString: connectionStringFromEnv() || fileConfig.database?.connectionString || '',
      schemas: {
        raw: process.env.RAW_SCHEMA || fileConfig.database?.schemas?.raw || 'raw',
        staging: process.env.STAGING_SCHEMA || fileConfig.database?.schemas?.staging || 'stg',
        warehouse: process.env.WAREHOUSE_SCHEMA || fileConfig.database?.schemas?.warehouse || 'dw',
        audit: process.env.AUDIT_SCHEMA || fileConfig.database?.schemas?.audit || 'etl_audit',
      }
    },
    inputFiles: {
      directory: process.env.INPUT_DIR || fileConfig.inputFiles?.directory || path.join(cwd, 'data', 'source'),
      brands: fileFor('brands'),
      categories: fileFor('categories'),
      customers: fileFor('customers'),
      products: fileFor('products'),
      orders: fileFor('orders'),
      orderItems: fileFor('orderItems'),
      stores: fileFor('stores'),
      staffs: fileFor('staffs'),
      stocks: fileFor('stocks'),
    },
    quality: {
      countVarianceThreshold:
        envNumber('COUNT_VARIANCE_THRESHOLD') ?? fileConfig.quality?.countVarianceThreshold ?? 0.05,
      totalAmountTolerance:
        envNumber('TOTAL_AMOUNT_TOLERANCE') ?? fileConfig.quality?.totalAmountTolerance ?? 0.01,
    },
    debugMode: envBoolean('DEBUG_MODE') ?? fileConfig.debugMode ?? false,
  };

  // Apply overrides
  if (overrides) {
    if (overrides.database?.connectionString) {
      config.database.connectionString = overrides.database.connectionString;
    }
    if (overrides.database?.schemas) {
      Object.assign(config.database.schemas, overrides.database.schemas);
    }
    if (overrides.inputFiles) {
      Object.assign(config.inputFiles, overrides.inputFiles);
    }
    if (overrides.quality) {
      Object.assign(config.quality, overrides.quality);
    }
    config.debugMode = overrides.debugMode ?? config.debugMode;
  }

  return config;
}

/**
 * Convert ETL config to mssql config
 */
export function getSqlConfig(config: ETLConfig): sql.config {
  if (!config.database.connectionString) {
    throw new Error('Database connection string is required');
  }

  const parsed = parseConnectionString(config.database.connectionString);

  if (!parsed.server || !parsed.database || !parsed.user || !parsed.password) {
    throw new Error('Invalid connection string. Expected format: Server=...;Database=...;User Id=...;Password=...;TrustServerCertificate=True;Encrypt=True;');
  }

  return {
    server: parsed.server,
    database: parsed.database,
    user: parsed.user,
    password: parsed.password,
    options: {
      encrypt: parsed.options?.encrypt ?? true,
      trustServerCertificate: parsed.options?.trustServerCertificate ?? true,
    },
    requestTimeout: 300000,
    connectionTimeout: 30000,
    pool: {
      max: 4,
      min: 0,
      idleTimeoutMillis: 30000,
    },
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: ETLConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.database.connectionString) {
    errors.push('Database connection string is required');
  }

  const schemas = config.database.schemas;
  if (!schemas.raw) errors.push('Raw schema name is required');
  if (!schemas.staging) errors.push('Staging schema name is required');
  if (!schemas.warehouse) errors.push('Warehouse schema name is required');
  if (!schemas.audit) errors.push('Audit schema name is required');

  const distinct = new Set(Object.values(schemas));
  if (distinct.size !== Object.keys(schemas).length) {
    errors.push('Raw, staging, warehouse and audit schemas must be distinct');
  }

  if (config.quality.countVarianceThreshold < 0 || config.quality.countVarianceThreshold > 1) {
    errors.push('Count variance threshold must be between 0 and 1');
  }
  if (config.quality.totalAmountTolerance < 0) {
    errors.push('Total amount tolerance must not be negative');
  }

  return {
    valid: errors.length === 0,
    errors
  };
}

/**
 * Mask the password in a connection string
 */
export function maskConnectionString(connectionString: string): string {
  return connectionString.replace(/(Password|Pwd)=[^;]+/i, '$1=***');
}

/**
 * Print configuration (for debugging, masks sensitive data)
 */
export function printConfig(config: ETLConfig, output: (line: string) => void = console.log): void {
  const masked: ETLConfig = {
    ...config,
    database: {
      ...config.database,
      connectionString: maskConnectionString(config.database.connectionString),
    },
  };

  output('\n📋 ETL Configuration:');
  output('════════════════════════════════════════════════════════════════');
  output(JSON.stringify(masked, null, 2));
  output('════════════════════════════════════════════════════════════════\n');
}
