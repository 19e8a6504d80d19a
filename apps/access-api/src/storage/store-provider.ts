import type { FactoryProvider } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DatabaseService } from '../database/database.service';
import type { StoreDriver } from './entity-store';

export interface StoreFactories<T> {
  mysql: (db: DatabaseService) => T;
  memory: () => T;
}

/** Binds `token` to the store implementation matching STORE_DRIVER. */
export function storeProvider<T>(token: string, factories: StoreFactories<T>): FactoryProvider<T> {
  return {
    provide: token,
    inject: [ConfigService, DatabaseService],
    useFactory: (config: ConfigService, db: DatabaseService) =>
      config.get<StoreDriver>('STORE_DRIVER') === 'memory' ? factories.memory() : factories.mysql(db)
  };
}
