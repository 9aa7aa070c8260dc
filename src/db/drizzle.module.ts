import { Global, Inject, Logger, Module, type OnApplicationShutdown } from '@nestjs/common';
import { drizzle } from 'drizzle-orm/node-postgres';
import { Pool } from 'pg';
import { AppConfigService } from '../config/app-config.service.js';
import * as schema from './schema/index.js';

export const DB = Symbol('DB');
export const DB_POOL = Symbol('DB_POOL');
export type DrizzleDB = ReturnType<typeof drizzle<typeof schema>>;

@Global()
@Module({
  providers: [
    {
      provide: DB_POOL,
      inject: [AppConfigService],
      // 연결은 첫 쿼리 시점에 맺는다: DATABASE_URL 이 없으면 쿼리가 나가지 않음
      useFactory: (config: AppConfigService) => new Pool({ connectionString: config.get().databaseUrl }),
    },
    {
      provide: DB,
      inject: [DB_POOL],
      useFactory: (pool: Pool) => drizzle(pool, { schema }),
    },
  ],
  exports: [DB],
})
export class DrizzleModule implements OnApplicationShutdown {
  private readonly logger = new Logger(DrizzleModule.name);

  constructor(@Inject(DB_POOL) private readonly pool: Pool) {}

  async onApplicationShutdown(): Promise<void> {
    await this.pool.end();
    this.logger.log('postgres pool closed');
  }
}
