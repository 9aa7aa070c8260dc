// 환경 변수 기반 설정: 기동 시 한 번 읽고 검증

import { Injectable, Logger } from '@nestjs/common';
import { isAbsolute, join } from 'path';
import { InvalidInputError } from '../common/errors/game-errors.js';

export interface AppConfig {
  port: number;
  databaseUrl: string | undefined;
  contentDir: string;
  staticContentDir: string;
  catalogTemplateChance: number;
  jwtSecret: string;
  production: boolean;
}

@Injectable()
export class AppConfigService {
  private readonly logger = new Logger(AppConfigService.name);
  private readonly config: AppConfig;

  constructor() {
    this.config = AppConfigService.parse(process.env);
    this.logger.log(
      `config loaded (port=${this.config.port}, content=${this.config.contentDir}, production=${this.config.production})`,
    );
  }

  static parse(env: NodeJS.ProcessEnv): AppConfig {
    const port = parseInt(env.PORT ?? '3000', 10);
    if (Number.isNaN(port) || port <= 0) {
      throw new InvalidInputError('PORT must be a positive integer', { PORT: env.PORT });
    }

    const catalogTemplateChance = parseFloat(env.CATALOG_TEMPLATE_CHANCE ?? '0.8');
    if (
      Number.isNaN(catalogTemplateChance) ||
      catalogTemplateChance < 0 ||
      catalogTemplateChance > 1
    ) {
      throw new InvalidInputError('CATALOG_TEMPLATE_CHANCE must be within [0, 1]', {
        CATALOG_TEMPLATE_CHANCE: env.CATALOG_TEMPLATE_CHANCE,
      });
    }

    return {
      port,
      databaseUrl: env.DATABASE_URL,
      contentDir: resolveDir(env.CONTENT_DIR ?? 'content/remote'),
      staticContentDir: resolveDir(env.STATIC_CONTENT_DIR ?? 'content/static'),
      catalogTemplateChance,
      jwtSecret: env.JWT_SECRET ?? 'dev-secret',
      production: env.NODE_ENV === 'production',
    };
  }

  get(): AppConfig {
    return this.config;
  }
}

function resolveDir(dir: string): string {
  return isAbsolute(dir) ? dir : join(process.cwd(), dir);
}
