import { Module } from '@nestjs/common';
import { storeProvider } from '../storage/store-provider';
import { KeyDatabaseStore } from './key-database.store';
import { KEY_MANAGER } from './key-manager';
import { KeyManagerService } from './key-manager.service';
import { KeyMemoryStore } from './key-memory.store';
import { KEY_STORE, type KeyStore } from './key.store';

@Module({
  providers: [
    storeProvider<KeyStore>(KEY_STORE, {
      mysql: (db) => new KeyDatabaseStore(db),
      memory: () => new KeyMemoryStore()
    }),
    KeyManagerService,
    { provide: KEY_MANAGER, useExisting: KeyManagerService }
  ],
  exports: [KEY_MANAGER, KeyManagerService]
})
export class KeysModule {}
