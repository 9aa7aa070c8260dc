// 테스트 공용 픽스처: 인메모리 카탈로그, 설정, 캐릭터

import { AppConfigService, type AppConfig } from '../config/app-config.service.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import { AffixService } from '../engine/rewards/affix.service.js';
import { LootService } from '../engine/rewards/loot.service.js';
import { PityService } from '../engine/rewards/pity.service.js';
import { RarityService } from '../engine/rewards/rarity.service.js';
import {
  emptyCatalog,
  type AffixDefinition,
  type Catalog,
  type EquipmentTemplate,
} from '../content/content.types.js';
import {
  emptyStatBlock,
  type CardDefinition,
  type CharacterSnapshot,
  type DungeonDefinition,
  type DungeonRoom,
  type RoomApproach,
} from '../db/types/index.js';

class FixedConfigService extends AppConfigService {
  constructor(private readonly overrides: Partial<AppConfig>) {
    super();
  }

  override get(): AppConfig {
    return { ...super.get(), ...this.overrides };
  }
}

export function configWith(overrides: Partial<AppConfig> = {}): AppConfigService {
  return new FixedConfigService(overrides);
}

export function contentWith(
  catalog: Partial<Catalog> = {},
  config: AppConfigService = configWith(),
): ContentLoaderService {
  const loader = new ContentLoaderService(config);
  loader.useSource({ kind: 'STATIC', catalog: { ...emptyCatalog(), ...catalog } });
  return loader;
}

/** 실제 희귀도·affix·pity 서비스로 조립한 LootService */
export function lootServiceWith(content: ContentLoaderService, config: AppConfigService = configWith()): LootService {
  return new LootService(config, content, new RarityService(), new AffixService(content), new PityService(content));
}

export function affixDef(overrides: Partial<AffixDefinition> & Pick<AffixDefinition, 'affixId'>): AffixDefinition {
  return {
    name: overrides.affixId,
    kind: 'PREFIX',
    bonusType: 'gold_percent',
    minValue: 3,
    maxValue: 8,
    minRarity: 'COMMON',
    active: true,
    ...overrides,
  };
}

export function templateDef(
  overrides: Partial<EquipmentTemplate> & Pick<EquipmentTemplate, 'templateId'>,
): EquipmentTemplate {
  return {
    name: overrides.templateId,
    descriptionKey: '',
    slot: 'WEAPON',
    rarity: 'RARE',
    primaryStat: 'STRENGTH',
    statBonus: 5,
    secondaryStat: null,
    secondaryStatBonus: 0,
    levelRequirement: 10,
    active: true,
    ...overrides,
  };
}

export function cardDef(overrides: Partial<CardDefinition> & Pick<CardDefinition, 'cardId'>): CardDefinition {
  return {
    name: overrides.cardId,
    description: '',
    theme: 'Cave',
    rarity: 'COMMON',
    bonusType: 'EXP_PERCENT',
    bonusValue: 0.01,
    sourceType: 'DUNGEON',
    sourceName: 'Dungeon: Test Grotto',
    dropChance: 0,
    active: true,
    ...overrides,
  };
}

export function roomDef(overrides: Partial<DungeonRoom> = {}): DungeonRoom {
  return {
    name: 'Test Hall',
    encounterType: 'COMBAT',
    primaryStat: 'STRENGTH',
    difficultyRating: 20,
    isBossRoom: false,
    bonusLootChance: 0,
    isBonusRoom: false,
    classGate: null,
    ...overrides,
  };
}

export function approachDef(overrides: Partial<RoomApproach> = {}): RoomApproach {
  return {
    name: 'Steady Push',
    primaryStat: 'STRENGTH',
    powerModifier: 1.0,
    riskModifier: 1.0,
    ...overrides,
  };
}

export function dungeonDef(overrides: Partial<DungeonDefinition> = {}): DungeonDefinition {
  return {
    dungeonId: 'test-grotto',
    name: 'Test Grotto',
    theme: 'Cave',
    difficulty: 'NORMAL',
    levelRequirement: 1,
    lootTier: 1,
    baseExpReward: 300,
    baseGoldReward: 150,
    statRequirements: [],
    rooms: [roomDef({ name: 'Entrance' }), roomDef({ name: 'Gallery' }), roomDef({ name: 'Lair', isBossRoom: true, encounterType: 'BOSS' })],
    active: true,
    ...overrides,
  };
}

export function characterWith(overrides: Partial<CharacterSnapshot> = {}): CharacterSnapshot {
  return {
    id: 'char-1',
    userId: 'user-1',
    name: 'Tester',
    level: 10,
    characterClass: null,
    stats: emptyStatBlock(),
    currentHp: 100,
    maxHp: 100,
    gold: 0,
    exp: 0,
    pityCounters: {},
    ...overrides,
  };
}
