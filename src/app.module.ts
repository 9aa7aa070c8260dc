import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { JwtModule } from '@nestjs/jwt';
import { ConfigModule } from './config/config.module.js';
import { AppConfigService } from './config/app-config.service.js';
import { DrizzleModule } from './db/drizzle.module.js';
import { GameExceptionFilter } from './common/filters/game-exception.filter.js';
import { ContentModule } from './content/content.module.js';
import { EngineModule } from './engine/engine.module.js';
import { StoreModule } from './store/store.module.js';
import { DropsModule } from './drops/drops.module.js';
import { DungeonsModule } from './dungeons/dungeons.module.js';
import { CardsModule } from './cards/cards.module.js';

@Module({
  imports: [
    ConfigModule,
    JwtModule.registerAsync({
      global: true,
      inject: [AppConfigService],
      useFactory: (config: AppConfigService) => ({ secret: config.get().jwtSecret }),
    }),
    DrizzleModule,
    ContentModule,
    StoreModule,
    EngineModule,
    DropsModule,
    DungeonsModule,
    CardsModule,
  ],
  providers: [
    {
      provide: APP_FILTER,
      useClass: GameExceptionFilter,
    },
  ],
})
export class AppModule {}
