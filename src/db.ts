import { Pool, type QueryResultRow } from "pg";
import type { Config } from "./config";
import { PoolExhaustionError, StoreError } from "./errors";
import type { QueryValue, SqlQuery } from "./models/types";
import type { QueryMonitor } from "./utils/performance";

export interface QueryExecutor {
  query(sql: SqlQuery): Promise<QueryResultRow[]>;
}

// pg の PoolClient / Pool のうち使う部分だけ
export interface PooledConnection {
  query(text: string, values?: QueryValue[]): Promise<{ rows: QueryResultRow[] }>;
  release(err?: Error | boolean): void;
}

export interface ConnectionPool {
  connect(): Promise<PooledConnection>;
  end(): Promise<void>;
}

export function createPool(config: Config): ConnectionPool {
  const pool = new Pool({
    connectionString: config.databaseUrl,
    max: config.poolMaxSize,
    connectionTimeoutMillis: config.poolConnectionTimeoutMs,
  });

  pool.on("error", (err) => {
    console.error("[db] Unexpected error on idle client", err);
  });

  return {
    async connect() {
      const client = await pool.connect();
      return {
        query: (text, values) => client.query(text, values),
        release: (err) => client.release(err),
      };
    },
    end: () => pool.end(),
  };
}

/**
 * ドライバのエラーは intent 付きの StoreError に包む
 */
export function connectionExecutor(connection: PooledConnection): QueryExecutor {
  return {
    async query(sql) {
      try {
        const result = await connection.query(sql.text, sql.values);
        return result.rows;
      } catch (error) {
        throw new StoreError(sql.intent, { cause: error });
      }
    },
  };
}

export function instrument(db: QueryExecutor, monitor: QueryMonitor): QueryExecutor {
  return {
    async query(sql) {
      const start = Date.now();
      try {
        return await db.query(sql);
      } finally {
        monitor.recordQuery(sql.intent, Date.now() - start);
      }
    },
  };
}

/**
 * 同じ接続に出したクエリをすべて完了させてから結果を返す。
 * 1つが失敗しても残りを待つので、実行中のクエリを残したまま接続を返却しない
 */
export async function settleAll<T>(queries: Array<Promise<T>>): Promise<T[]> {
  const results = await Promise.allSettled(queries);
  const values: T[] = [];
  for (const result of results) {
    if (result.status === "rejected") {
      throw result.reason;
    }
    values.push(result.value);
  }
  return values;
}

// pg-pool がプールの空き待ちでタイムアウトしたときのメッセージ
const POOL_TIMEOUT_MESSAGE = "timeout exceeded when trying to connect";

function isConnectTimeout(error: unknown): boolean {
  return error instanceof Error && error.message.includes(POOL_TIMEOUT_MESSAGE);
}

/**
 * プールのハンドル。接続はリクエスト単位で取得し、必ず返却する
 */
export class Database {
  constructor(
    private readonly pool: ConnectionPool,
    private readonly connectionTimeoutMs: number,
    private readonly maxSize: number
  ) {}

  async withClient<T>(
    fn: (db: QueryExecutor) => Promise<T>,
    monitor?: QueryMonitor
  ): Promise<T> {
    let connection: PooledConnection;
    try {
      connection = await this.pool.connect();
    } catch (error) {
      if (isConnectTimeout(error)) {
        throw new PoolExhaustionError(this.connectionTimeoutMs, { cause: error });
      }
      throw new StoreError("connect", { cause: error });
    }

    const db = connectionExecutor(connection);
    try {
      return await fn(monitor ? instrument(db, monitor) : db);
    } finally {
      connection.release();
    }
  }

  /**
   * 起動直後のレイテンシを避けるため、接続を先に張っておく
   */
  async warm(count: number): Promise<number> {
    const warmCount = Math.min(count, this.maxSize);
    console.log(`[db] Warming up pool with ${warmCount} connections...`);

    // 全接続を同時に保持しないとプールが同じ接続を使い回す
    const connections = await Promise.allSettled(
      Array.from({ length: warmCount }, () => this.pool.connect())
    );

    let success = 0;
    for (const result of connections) {
      if (result.status === "rejected") {
        console.warn("[db] Failed to warm connection:", result.reason);
        continue;
      }
      try {
        await result.value.query("SELECT 1");
        success++;
      } catch (error) {
        console.warn("[db] Failed to warm connection:", error);
      } finally {
        result.value.release();
      }
    }

    console.log(`[db] Pool warmed: ${success}/${warmCount} connections ready`);
    return success;
  }

  async testConnection(): Promise<boolean> {
    try {
      const rows = await this.withClient((db) =>
        db.query({ intent: "health.now", text: "SELECT NOW() as now", values: [] })
      );
      console.log("[db] Database connection test successful:", rows[0]);
      return true;
    } catch (error) {
      console.error("[db] Database connection test failed:", error);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
