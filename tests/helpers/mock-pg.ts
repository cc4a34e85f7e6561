import { newDb, type IMemoryDb } from 'pg-mem';
import { type Pool, type PoolClient, type QueryResult, type QueryResultRow } from 'pg';

type QueryConfig = { text: string } & Record<string, unknown>;

type NormalizedQuery = {
  text?: string;
  config?: Record<string, unknown>;
  rowMode?: unknown;
};

interface QueryRunner {
  query(configOrText: unknown, values?: unknown): Promise<QueryResult<QueryResultRow>>;
}

type LooseQuery = QueryRunner['query'];

function isQueryConfig(value: unknown): value is QueryConfig {
  return typeof value === 'object' && value !== null && typeof Reflect.get(value, 'text') === 'string';
}

function extractQueryConfig(configOrText: unknown): NormalizedQuery {
  if (typeof configOrText === 'string') {
    return { text: configOrText };
  }

  if (isQueryConfig(configOrText)) {
    // pg-mem ignores custom type parsers and answers rowMode: 'array' with objects.
    const { text, rowMode, types: _types, ...rest } = configOrText;
    return { text, config: rest, rowMode };
  }

  return {};
}

function applyRowMode(result: QueryResult<QueryResultRow>, rowMode: unknown): QueryResult<QueryResultRow> {
  if (rowMode !== 'array' || result.rows.length === 0 || Array.isArray(result.rows[0])) {
    return result;
  }

  const columnNames =
    Array.isArray(result.fields) && result.fields.length > 0
      ? result.fields.map((field) => field.name)
      : Object.keys(result.rows[0]);

  return {
    ...result,
    rows: result.rows.map((row) => columnNames.map((column) => row[column])),
  };
}

function wrapQuery(target: QueryRunner): LooseQuery {
  const original = target.query.bind(target);

  return async (configOrText, values) => {
    const { text, config, rowMode } = extractQueryConfig(configOrText);

    if (!text) {
      return original(configOrText, values);
    }

    const result = config
      ? await original({ ...config, text }, values)
      : await original(text, values);

    return applyRowMode(result, rowMode);
  };
}

function patchPool(pool: Pool): Pool {
  pool.query = wrapQuery(pool) as Pool['query'];

  const originalConnect = pool.connect.bind(pool);
  pool.connect = (async () => {
    const client: PoolClient = await originalConnect();
    client.query = wrapQuery(client) as PoolClient['query'];
    return client;
  }) as Pool['connect'];

  return pool;
}

export function createMemoryDb(): IMemoryDb {
  return newDb({ autoCreateForeignKeyIndices: true });
}

export function createMockPool(mem: IMemoryDb = createMemoryDb()): Pool {
  const { Pool: MemPool } = mem.adapters.createPg();
  const pool: Pool = new MemPool();
  return patchPool(pool);
}
