import type { RowDataPacket } from 'mysql2/promise';
import type { DatabaseService } from '../database/database.service';
import { instanceIdOf, resource, specificResource, type AnyResource } from './resource';
import { isRestMethod, type RestMethod } from './rest-method.enum';
import type { Right } from './right.entity';
import { DuplicateGrantError, RightAlreadyGrantedError, RightIntegrityError } from './rights.errors';
import type { RightsStore } from './rights.store';
import type { Subject } from './subject';

interface RightRow extends RowDataPacket {
  id: string;
  group_id: string | null;
  group_name: string | null;
  user_id: string | null;
  user_pseudo: string | null;
  resource_name: string;
  resource_instance_id: string | null;
  method: string;
}

function isDuplicateEntry(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ER_DUP_ENTRY';
}

const RIGHT_COLUMNS = ['id', 'group_id', 'user_id', 'resource_name', 'resource_instance_id', 'method'] as const;

/**
 * Rights live in `rights`, referencing either `security_groups` or `users`.
 * Reads join the subject table so a Right comes back with its subject's name.
 */
export class RightDatabaseStore implements RightsStore {
  constructor(private readonly db: DatabaseService) {}

  async find(subject: Subject, res: AnyResource, method: RestMethod): Promise<Right | undefined> {
    const instanceId = instanceIdOf(res);
    // LIMIT 2: enough to tell "one" from "more than one".
    const rows =
      subject.kind === 'group'
        ? await this.db.sql<RightRow[]>`
            SELECT r.id, r.group_id, g.name AS group_name, r.user_id, NULL AS user_pseudo,
                   r.resource_name, r.resource_instance_id, r.method
            FROM rights r JOIN security_groups g ON g.id = r.group_id
            WHERE r.group_id = ${subject.group.id} AND r.resource_name = ${res.name}
              AND r.resource_instance_id <=> ${instanceId} AND r.method = ${method}
            LIMIT 2`
        : await this.db.sql<RightRow[]>`
            SELECT r.id, r.group_id, NULL AS group_name, r.user_id, u.pseudo AS user_pseudo,
                   r.resource_name, r.resource_instance_id, r.method
            FROM rights r JOIN users u ON u.id = r.user_id
            WHERE r.user_id = ${subject.user.id} AND r.resource_name = ${res.name}
              AND r.resource_instance_id <=> ${instanceId} AND r.method = ${method}
            LIMIT 2`;

    if (rows.length > 1) {
      throw new DuplicateGrantError(subject, res, method, rows.length);
    }
    const row = rows[0];
    return row ? this.toRight(row) : undefined;
  }

  async findBySubject(subject: Subject): Promise<Right[]> {
    const rows =
      subject.kind === 'group'
        ? await this.db.sql<RightRow[]>`
            SELECT r.id, r.group_id, g.name AS group_name, r.user_id, NULL AS user_pseudo,
                   r.resource_name, r.resource_instance_id, r.method
            FROM rights r JOIN security_groups g ON g.id = r.group_id
            WHERE r.group_id = ${subject.group.id}`
        : await this.db.sql<RightRow[]>`
            SELECT r.id, r.group_id, NULL AS group_name, r.user_id, u.pseudo AS user_pseudo,
                   r.resource_name, r.resource_instance_id, r.method
            FROM rights r JOIN users u ON u.id = r.user_id
            WHERE r.user_id = ${subject.user.id}`;
    return rows.map((row) => this.toRight(row));
  }

  async findById(id: string): Promise<Right | undefined> {
    const rows = await this.db.sql<RightRow[]>`
      SELECT r.id, r.group_id, g.name AS group_name, r.user_id, u.pseudo AS user_pseudo,
             r.resource_name, r.resource_instance_id, r.method
      FROM rights r
        LEFT JOIN security_groups g ON g.id = r.group_id
        LEFT JOIN users u ON u.id = r.user_id
      WHERE r.id = ${id}`;
    const row = rows[0];
    return row ? this.toRight(row) : undefined;
  }

  async findAll(): Promise<Right[]> {
    const rows = await this.db.sql<RightRow[]>`
      SELECT r.id, r.group_id, g.name AS group_name, r.user_id, u.pseudo AS user_pseudo,
             r.resource_name, r.resource_instance_id, r.method
      FROM rights r
        LEFT JOIN security_groups g ON g.id = r.group_id
        LEFT JOIN users u ON u.id = r.user_id
      ORDER BY r.resource_name ASC, r.method ASC, r.id ASC`;
    return rows.map((row) => this.toRight(row));
  }

  /** @throws RightAlreadyGrantedError when uq_rights_grant rejects the row */
  async save(right: Right): Promise<Right> {
    try {
      await this.insertRow(right);
    } catch (error) {
      if (isDuplicateEntry(error)) {
        throw new RightAlreadyGrantedError(right.subject, right.resource, right.method);
      }
      throw error;
    }
    return right;
  }

  private async insertRow(right: Right): Promise<void> {
    await this.db.insert(
      'rights',
      {
        id: right.id,
        group_id: right.subject.kind === 'group' ? right.subject.group.id : null,
        user_id: right.subject.kind === 'user' ? right.subject.user.id : null,
        resource_name: right.resource.name,
        resource_instance_id: instanceIdOf(right.resource),
        method: right.method
      },
      RIGHT_COLUMNS
    );
  }

  async remove(id: string): Promise<boolean> {
    return (await this.db.deleteByKey('rights', 'id', id)) > 0;
  }

  private toRight(row: RightRow): Right {
    return {
      id: row.id,
      subject: this.toSubject(row),
      resource:
        row.resource_instance_id === null
          ? resource(row.resource_name)
          : specificResource(row.resource_name, row.resource_instance_id),
      method: this.toMethod(row)
    };
  }

  private toSubject(row: RightRow): Subject {
    if (row.group_id !== null && row.user_id !== null) {
      throw new RightIntegrityError(row.id, 'both group and user are set');
    }
    if (row.group_id !== null) {
      if (row.group_name === null) throw new RightIntegrityError(row.id, `group ${row.group_id} does not exist`);
      return { kind: 'group', group: { id: row.group_id, name: row.group_name } };
    }
    if (row.user_id !== null) {
      if (row.user_pseudo === null) throw new RightIntegrityError(row.id, `user ${row.user_id} does not exist`);
      return { kind: 'user', user: { id: row.user_id, pseudo: row.user_pseudo } };
    }
    throw new RightIntegrityError(row.id, 'neither group nor user is set');
  }

  private toMethod(row: RightRow): RestMethod {
    if (!isRestMethod(row.method)) {
      throw new RightIntegrityError(row.id, `unknown method ${row.method}`);
    }
    return row.method;
  }
}
