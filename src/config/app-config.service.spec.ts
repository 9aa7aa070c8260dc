import { join } from 'path';
import { AppConfigService } from './app-config.service.js';
import { InvalidInputError } from '../common/errors/game-errors.js';

describe('AppConfigService.parse', () => {
  it('환경 변수가 없으면 기본값', () => {
    const config = AppConfigService.parse({});
    expect(config.port).toBe(3000);
    expect(config.catalogTemplateChance).toBe(0.8);
    expect(config.jwtSecret).toBe('dev-secret');
    expect(config.production).toBe(false);
    expect(config.databaseUrl).toBeUndefined();
    expect(config.contentDir).toBe(join(process.cwd(), 'content/remote'));
    expect(config.staticContentDir).toBe(join(process.cwd(), 'content/static'));
  });

  it('절대 경로는 그대로 사용', () => {
    const config = AppConfigService.parse({ CONTENT_DIR: '/srv/catalog' });
    expect(config.contentDir).toBe('/srv/catalog');
  });

  it('NODE_ENV=production', () => {
    const config = AppConfigService.parse({ NODE_ENV: 'production', JWT_SECRET: 'test-secret' });
    expect(config.production).toBe(true);
    expect(config.jwtSecret).toBe('test-secret');
  });

  it('숫자가 아닌 PORT → InvalidInputError', () => {
    expect(() => AppConfigService.parse({ PORT: 'abc' })).toThrow(InvalidInputError);
  });

  it('범위를 벗어난 템플릿 확률 → InvalidInputError', () => {
    expect(() => AppConfigService.parse({ CATALOG_TEMPLATE_CHANCE: '1.5' })).toThrow(
      InvalidInputError,
    );
    expect(() => AppConfigService.parse({ CATALOG_TEMPLATE_CHANCE: 'x' })).toThrow(
      InvalidInputError,
    );
  });
});
