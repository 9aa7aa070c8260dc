import { Logger } from '@nestjs/common';
import { cp, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { InternalError } from '../common/errors/game-errors.js';
import { configWith } from '../testing/fixtures.js';
import { ContentLoaderService } from './content-loader.service.js';

const STATIC_DIR = join(process.cwd(), 'content/static');

describe('ContentLoaderService', () => {
  let remoteDir: string;

  beforeEach(async () => {
    remoteDir = await mkdtemp(join(tmpdir(), 'catalog-'));
    jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(remoteDir, { recursive: true, force: true });
  });

  function loaderFor(staticContentDir = STATIC_DIR): ContentLoaderService {
    return new ContentLoaderService(configWith({ contentDir: remoteDir, staticContentDir }));
  }

  it('remote catalog 가 없으면 번들 static 카탈로그 사용', async () => {
    const loader = loaderFor();
    const source = await loader.load();

    expect(source.kind).toBe('STATIC');
    expect(source.catalog.cards).toHaveLength(24);
    expect(source.catalog.equipment).toHaveLength(21);
    expect(loader.dungeons().map((d) => d.dungeonId)).toEqual(['mossy-cavern', 'sunken-archive', 'ember-forge']);
    expect(loader.dungeon('mossy-cavern')?.rooms).toHaveLength(9);
    expect(Logger.prototype.warn).toHaveBeenCalledTimes(1);
  });

  it('remote 섹션이 있으면 우선, 비어 있는 섹션은 static 으로 채움', async () => {
    await writeFile(
      join(remoteDir, 'catalog.json'),
      JSON.stringify({
        version: '2026.10.1',
        cards: [
          {
            cardId: 'card_test_slime',
            name: 'Test Slime',
            theme: 'Cave',
            rarity: 'COMMON',
            bonusType: 'EXP_PERCENT',
            bonusValue: 0.01,
            sourceType: 'DUNGEON',
            sourceName: 'Dungeon: Test',
          },
        ],
      }),
    );

    const loader = loaderFor();
    const source = await loader.load();

    expect(source.kind).toBe('REMOTE');
    expect(source.kind === 'REMOTE' && source.version).toBe('2026.10.1');
    expect(loader.cardPool().map((c) => c.cardId)).toEqual(['card_test_slime']);
    expect(loader.cardPool()[0]?.dropChance).toBe(0);
    expect(loader.dungeons()).toHaveLength(3);
  });

  it('remote JSON 이 깨져 있으면 static 으로 폴백', async () => {
    await writeFile(join(remoteDir, 'catalog.json'), '{ not json');
    const source = await loaderFor().load();
    expect(source.kind).toBe('STATIC');
    expect(source.catalog.cards).toHaveLength(24);
  });

  it('remote 검증 실패도 static 으로 폴백', async () => {
    await writeFile(join(remoteDir, 'catalog.json'), JSON.stringify({ cards: [{ cardId: '' }] }));
    const source = await loaderFor().load();
    expect(source.kind).toBe('STATIC');
  });

  it('static 섹션 JSON 이 깨져 있으면 InternalError', async () => {
    const staticDir = await mkdtemp(join(tmpdir(), 'static-'));
    try {
      await cp(STATIC_DIR, staticDir, { recursive: true });
      await writeFile(join(staticDir, 'equipment.json'), '[{ broken');
      await expect(loaderFor(staticDir).load()).rejects.toMatchObject({
        code: 'INTERNAL_ERROR',
        message: 'static catalog section is not valid JSON: equipment.json',
      });
    } finally {
      await rm(staticDir, { recursive: true, force: true });
    }
  });

  it('필수 static 섹션이 없으면 InternalError', async () => {
    await expect(loaderFor(remoteDir).load()).rejects.toThrow(InternalError);
  });
});
