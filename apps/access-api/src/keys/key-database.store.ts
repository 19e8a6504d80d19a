import type { RowDataPacket } from 'mysql2/promise';
import type { DatabaseService } from '../database/database.service';
import type { KeyType } from './key-type.enum';
import type { KeyStore, StoredKey } from './key.store';

interface KeyRow extends RowDataPacket {
  name: string;
  type: string;
  public_key: string;
  private_key: string;
}

const KEY_COLUMNS = ['name', 'type', 'public_key', 'private_key'] as const;

/** `signing_keys(name, type, public_key, private_key)`, unique on (name, type). */
export class KeyDatabaseStore implements KeyStore {
  constructor(private readonly db: DatabaseService) {}

  async findByName(name: string, type: KeyType): Promise<StoredKey | undefined> {
    const rows = await this.db.sql<KeyRow[]>`
      SELECT name, type, public_key, private_key FROM signing_keys
      WHERE name = ${name} AND type = ${type}
      LIMIT 1`;
    const row = rows[0];
    return row ? { name: row.name, type, publicKeyPem: row.public_key, privateKeyPem: row.private_key } : undefined;
  }

  async save(key: StoredKey): Promise<StoredKey> {
    await this.db.insert(
      'signing_keys',
      { name: key.name, type: key.type, public_key: key.publicKeyPem, private_key: key.privateKeyPem },
      KEY_COLUMNS
    );
    return key;
  }
}
