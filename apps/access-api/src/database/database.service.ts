import { Injectable, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createPool, Pool, PoolConnection, RowDataPacket } from 'mysql2/promise';
import { readFileSync } from 'node:fs';
import { JsonLogger } from '../logging/json-logger.service';

export type SortDirection = 'ASC' | 'DESC';

export interface OrderBy {
  readonly column: string;
  readonly direction: SortDirection;
}

/** Writes that share one connection and commit or roll back together. */
export interface DatabaseTransaction {
  deleteByKey(table: string, keyColumn: string, keyValue: unknown): Promise<number>;
}

/**
 * DatabaseService owns the mysql2 pool and the only places where SQL text is built.
 * Identifiers are validated and backticked; values always travel as "?" parameters.
 * The pool is created only for STORE_DRIVER=mysql.
 */
@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private pool?: Pool;
  private static readonly identifierPattern = /^[A-Za-z0-9_]+$/;

  constructor(private readonly config: ConfigService, private readonly logger: JsonLogger) {}

  onModuleInit() {
    if (this.config.get<string>('STORE_DRIVER') !== 'mysql') {
      this.logger.log('Memory store driver selected; database pool not created');
      return;
    }

    const host = this.config.get<string>('DB_HOST');
    const user = this.config.get<string>('DB_USER');
    const database = this.config.get<string>('DB_NAME');

    if (!host || !user || !database) {
      this.logger.warn('Database configuration missing; pool not created');
      return;
    }

    const port = Number(this.config.get<number>('DB_PORT') ?? 3306);
    const password = this.config.get<string>('DB_PASSWORD');
    const ssl = this.buildSslConfig();

    this.pool = createPool({
      host,
      port,
      user,
      password,
      database,
      ...(ssl ? { ssl } : {})
    });

    this.logger.log('Database pool initialized', { host, port, database, tls: Boolean(ssl) });
  }

  private buildSslConfig(): { rejectUnauthorized: boolean; ca?: string } | undefined {
    if (this.config.get<boolean>('DB_SSL') === false) {
      return undefined;
    }

    const rejectUnauthorized = this.config.get<boolean>('DB_SSL_REJECT_UNAUTHORIZED') !== false;
    const caPath = this.config.get<string>('DB_SSL_CA_PATH');

    let ca: string | undefined;
    if (caPath) {
      try {
        ca = readFileSync(caPath, 'utf8');
      } catch (error) {
        this.logger.warn('Failed to read DB SSL CA file; continuing without custom CA', {
          caPath,
          error: (error as Error).message
        });
      }
    }

    if (!rejectUnauthorized) {
      this.logger.warn('DB TLS verification is disabled (DB_SSL_REJECT_UNAUTHORIZED=false)');
    }

    return ca ? { rejectUnauthorized, ca } : { rejectUnauthorized };
  }

  async onModuleDestroy() {
    if (this.pool) {
      await this.pool.end();
    }
  }

  async getConnection(): Promise<PoolConnection> {
    if (!this.pool) {
      throw new Error('Database pool is not initialized');
    }
    return this.pool.getConnection();
  }

  private static assertSafeIdentifier(identifier: string) {
    if (!DatabaseService.identifierPattern.test(identifier)) {
      throw new Error(`Unsafe SQL identifier: ${identifier}`);
    }
  }

  private static ident(identifier: string): string {
    DatabaseService.assertSafeIdentifier(identifier);
    return `\`${identifier}\``;
  }

  private static templateToSql(strings: TemplateStringsArray, valueCount: number): string {
    let sql = '';
    for (let i = 0; i < strings.length; i++) {
      sql += strings[i];
      if (i < valueCount) {
        sql += '?';
      }
    }
    return sql;
  }

  private static async query<T>(connection: PoolConnection, sql: string, params: readonly unknown[]): Promise<T> {
    const [rows] = await connection.query(sql, params);
    return rows as T;
  }

  private async run<T>(sql: string, params: readonly unknown[]): Promise<T> {
    const connection = await this.getConnection();
    try {
      return await DatabaseService.query<T>(connection, sql, params);
    } finally {
      connection.release();
    }
  }

  /**
   * Runs `work` inside BEGIN/COMMIT on one pooled connection.
   * Any rejection rolls the whole unit back and is rethrown.
   */
  async transaction<T>(work: (tx: DatabaseTransaction) => Promise<T>): Promise<T> {
    const connection = await this.getConnection();
    try {
      await connection.beginTransaction();
      const result = await work({
        deleteByKey: async (table, keyColumn, keyValue) => {
          const header = await DatabaseService.query<{ affectedRows?: number }>(
            connection,
            DatabaseService.deleteSql(table, keyColumn),
            [keyValue]
          );
          return header.affectedRows ?? 0;
        }
      });
      await connection.commit();
      return result;
    } catch (error) {
      await connection.rollback();
      throw error;
    } finally {
      connection.release();
    }
  }

  // Tagged-template SQL helper. Interpolations become prepared-statement parameters.
  // Usage: await db.sql`SELECT * FROM t WHERE id = ${id}`
  async sql<T = RowDataPacket[]>(strings: TemplateStringsArray, ...params: unknown[]): Promise<T> {
    return this.run<T>(DatabaseService.templateToSql(strings, params.length), params);
  }

  async selectAll<T extends RowDataPacket>(
    table: string,
    columns: readonly string[],
    orderBy: readonly OrderBy[] = []
  ): Promise<T[]> {
    const order =
      orderBy.length > 0
        ? ` ORDER BY ${orderBy.map((o) => `${DatabaseService.ident(o.column)} ${o.direction === 'DESC' ? 'DESC' : 'ASC'}`).join(', ')}`
        : '';
    const sql = `SELECT ${columns.map(DatabaseService.ident).join(', ')} FROM ${DatabaseService.ident(table)}${order}`;
    return this.run<T[]>(sql, []);
  }

  async selectByKey<T extends RowDataPacket>(
    table: string,
    columns: readonly string[],
    keyColumn: string,
    keyValue: unknown
  ): Promise<T[]> {
    const sql =
      `SELECT ${columns.map(DatabaseService.ident).join(', ')} FROM ${DatabaseService.ident(table)}` +
      ` WHERE ${DatabaseService.ident(keyColumn)} = ?`;
    return this.run<T[]>(sql, [keyValue]);
  }

  async insert(table: string, values: Record<string, unknown>, allowedColumns: readonly string[]): Promise<void> {
    const allowed = new Set(allowedColumns);
    const entries = Object.entries(values).filter(([, v]) => v !== undefined);
    if (entries.length === 0) {
      throw new Error(`Nothing to insert into ${table}`);
    }

    for (const [column] of entries) {
      if (!allowed.has(column)) {
        throw new Error(`Disallowed insert column: ${column}`);
      }
    }

    const sql =
      `INSERT INTO ${DatabaseService.ident(table)} (${entries.map(([c]) => DatabaseService.ident(c)).join(', ')})` +
      ` VALUES (${entries.map(() => '?').join(', ')})`;
    await this.run(sql, entries.map(([, v]) => v));
  }

  /** @returns number of deleted rows */
  async deleteByKey(table: string, keyColumn: string, keyValue: unknown): Promise<number> {
    const result = await this.run<{ affectedRows?: number }>(DatabaseService.deleteSql(table, keyColumn), [keyValue]);
    return result.affectedRows ?? 0;
  }

  private static deleteSql(table: string, keyColumn: string): string {
    return `DELETE FROM ${DatabaseService.ident(table)} WHERE ${DatabaseService.ident(keyColumn)} = ?`;
  }
}
