import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  ETLConfig,
  getSqlConfig,
  loadConfig,
  maskConnectionString,
  parseConnectionString,
  validateConfig,
} from '../config-loader';

const ENV_KEYS = [
  'SQLSERVER',
  'SQLSERVER_HOST',
  'SQLSERVER_DATABASE',
  'SQLSERVER_USER',
  'SQLSERVER_PASSWORD',
  'RAW_SCHEMA',
  'STAGING_SCHEMA',
  'WAREHOUSE_SCHEMA',
  'AUDIT_SCHEMA',
  'INPUT_DIR',
  'INPUT_BRANDS',
  'INPUT_ORDER_ITEMS',
  'COUNT_VARIANCE_THRESHOLD',
  'TOTAL_AMOUNT_TOLERANCE',
  'DEBUG_MODE',
];

const CONNECTION = 'Server=db.local;Database=sales_dw;User Id=etl;Password=test-secret;TrustServerCertificate=True;Encrypt=True;';

describe('loadConfig', () => {
  let workDir: string;
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'etl-config-'));
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  test('should fall back to defaults without appsettings.json', () => {
    const config = loadConfig(undefined, workDir);

    expect(config.database.schemas).toEqual({ raw: 'raw', staging: 'stg', warehouse: 'dw', audit: 'etl_audit' });
    expect(config.inputFiles.directory).toBe(path.join(workDir, 'data', 'source'));
    expect(config.inputFiles.orderItems).toBe('order_items.csv');
    expect(config.quality).toEqual({ countVarianceThreshold: 0.05, totalAmountTolerance: 0.01 });
    expect(config.debugMode).toBe(false);
  });

  test('should read appsettings.json', () => {
    fs.writeFileSync(
      path.join(workDir, 'appsettings.json'),
      JSON.stringify({
        database: { connectionString: CONNECTION, schemas: { warehouse: 'mart' } },
        inputFiles: { brands: 'brand_list.csv' },
        quality: { countVarianceThreshold: 0.1 },
      })
    );

    const config = loadConfig(undefined, workDir);

    expect(config.database.connectionString).toBe(CONNECTION);
    expect(config.database.schemas.warehouse).toBe('mart');
    expect(config.database.schemas.raw).toBe('raw');
    expect(config.inputFiles.brands).toBe('brand_list.csv');
    expect(config.quality.countVarianceThreshold).toBe(0.1);
  });

  test('should let environment variables win over appsettings.json', () => {
    fs.writeFileSync(
      path.join(workDir, 'appsettings.json'),
      JSON.stringify({ inputFiles: { directory: '/from/file' }, debugMode: false })
    );
    process.env.INPUT_DIR = '/from/env';
    process.env.DEBUG_MODE = 'true';
    process.env.TOTAL_AMOUNT_TOLERANCE = '0.5';

    const config = loadConfig(undefined, workDir);

    expect(config.inputFiles.directory).toBe('/from/env');
    expect(config.debugMode).toBe(true);
    expect(config.quality.totalAmountTolerance).toBe(0.5);
  });

  test('should build the connection string from its parts', () => {
    process.env.SQLSERVER_HOST = 'db.local';
    process.env.SQLSERVER_DATABASE = 'sales_dw';
    process.env.SQLSERVER_USER = 'etl';
    process.env.SQLSERVER_PASSWORD = 'test-secret';

    const config = loadConfig(undefined, workDir);

    expect(config.database.connectionString).toBe(
      'Server=db.local;Database=sales_dw;User Id=etl;Password=test-secret;TrustServerCertificate=True;Encrypt=True;'
    );
  });

  test('should apply overrides last', () => {
    process.env.RAW_SCHEMA = 'landing';

    const config = loadConfig(
      { database: { schemas: { raw: 'raw_override' } }, inputFiles: { stocks: 'inv.csv' }, debugMode: true },
      workDir
    );

    expect(config.database.schemas.raw).toBe('raw_override');
    expect(config.inputFiles.stocks).toBe('inv.csv');
    expect(config.debugMode).toBe(true);
  });

  test('should reject an appsettings.json of the wrong shape', () => {
    fs.writeFileSync(path.join(workDir, 'appsettings.json'), JSON.stringify({ debugMode: 'yes' }));

    expect(() => loadConfig(undefined, workDir)).toThrow('Invalid appsettings.json: debugMode: Expected boolean, received string');
  });
});

describe('parseConnectionString', () => {
  test('should read the server, database and credentials', () => {
    expect(parseConnectionString(CONNECTION)).toEqual({
      server: 'db.local',
      database: 'sales_dw',
      user: 'etl',
      password: 'test-secret',
      options: { encrypt: true, trustServerCertificate: true },
    });
  });
});

describe('getSqlConfig', () => {
  const base: ETLConfig = {
    database: {
      connectionString: CONNECTION,
      schemas: { raw: 'raw', staging: 'stg', warehouse: 'dw', audit: 'etl_audit' },
    },
    inputFiles: {
      directory: '.',
      brands: 'brands.csv',
      categories: 'categories.csv',
      customers: 'customers.csv',
      products: 'products.csv',
      orders: 'orders.csv',
      orderItems: 'order_items.csv',
      stores: 'stores.csv',
      staffs: 'staffs.csv',
      stocks: 'stocks.csv',
    },
    quality: { countVarianceThreshold: 0.05, totalAmountTolerance: 0.01 },
    debugMode: false,
  };

  test('should build an mssql config', () => {
    const config = getSqlConfig(base);

    expect(config.server).toBe('db.local');
    expect(config.database).toBe('sales_dw');
    expect(config.options).toEqual({ encrypt: true, trustServerCertificate: true });
  });

  test('should reject an incomplete connection string', () => {
    expect(() => getSqlConfig({ ...base, database: { ...base.database, connectionString: 'Server=db.local;' } })).toThrow(
      'Invalid connection string'
    );
  });

  test('should report configuration problems', () => {
    const result = validateConfig({
      ...base,
      database: { connectionString: '', schemas: { raw: 'raw', staging: 'raw', warehouse: 'dw', audit: 'etl_audit' } },
      quality: { countVarianceThreshold: 2, totalAmountTolerance: 0.01 },
    });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      'Database connection string is required',
      'Raw, staging, warehouse and audit schemas must be distinct',
      'Count variance threshold must be between 0 and 1',
    ]);
  });
});

describe('maskConnectionString', () => {
  test('should hide the password', () => {
    expect(maskConnectionString(CONNECTION)).toBe(
      'Server=db.local;Database=sales_dw;User Id=etl;Password=***;TrustServerCertificate=True;Encrypt=True;'
    );
  });
});
