import { Global, Logger, Module } from '@nestjs/common';
import { AppConfigService } from '../config/app-config.service.js';
import { DrizzleGameStore } from './drizzle-game-store.js';
import { GAME_STORE, type GameStore } from './game-store.js';
import { InMemoryGameStore } from './in-memory-game-store.js';

@Global()
@Module({
  providers: [
    DrizzleGameStore,
    {
      provide: GAME_STORE,
      inject: [AppConfigService, DrizzleGameStore],
      useFactory: (config: AppConfigService, drizzleStore: DrizzleGameStore): GameStore => {
        if (config.get().databaseUrl) {
          return drizzleStore;
        }
        new Logger('StoreModule').warn('DATABASE_URL not set; using in-memory store (data is lost on restart)');
        return new InMemoryGameStore();
      },
    },
  ],
  exports: [GAME_STORE],
})
export class StoreModule {}
