// 장비 드랍 생성: 카탈로그 템플릿 우선, 없으면 절차적 생성 + affix

import { Injectable } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { AppConfigService } from '../../config/app-config.service.js';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import type { EquipmentTemplate } from '../../content/content.types.js';
import { InvalidInputError } from '../../common/errors/game-errors.js';
import {
  EQUIPMENT_SLOT,
  MAX_ENHANCEMENT_LEVEL,
  STAT_TYPE,
  maxRarity,
  type CharacterClass,
  type CharacterSnapshot,
  type ContentType,
  type DungeonDifficulty,
  type EquipmentItem,
  type EquipmentSlot,
  type Rarity,
  type StatType,
} from '../../db/types/index.js';
import type { Rng } from '../rng/rng.service.js';
import { AffixService } from './affix.service.js';
import { PityService } from './pity.service.js';
import { RarityService, assertTier, type RarityRoll } from './rarity.service.js';

// 플레이어 레벨보다 이만큼 높은 요구 레벨까지 허용
const LEVEL_HEADROOM = 5;

export interface LootOptions {
  slot?: EquipmentSlot;
  // 지정 시 희귀도 롤을 건너뜀
  forcedRarity?: Rarity;
  characterClass?: CharacterClass | null;
  playerLevel?: number;
  ownerId?: string | null;
}

export interface LootGeneration {
  item: EquipmentItem;
  // forcedRarity 인 경우 null
  rarityRoll: RarityRoll | null;
}

export interface PityDrop {
  dropped: boolean;
  forcedMinRarity: Rarity | null;
  item: EquipmentItem | null;
  counters: CharacterSnapshot['pityCounters'];
}

export interface PityDropOptions {
  baseChance?: number;
  slot?: EquipmentSlot;
}

@Injectable()
export class LootService {
  constructor(
    private readonly config: AppConfigService,
    private readonly contentLoader: ContentLoaderService,
    private readonly rarityService: RarityService,
    private readonly affixService: AffixService,
    private readonly pityService: PityService,
  ) {}

  generate(tier: number, luck: number, rng: Rng, options: LootOptions = {}): EquipmentItem {
    return this.generateDetailed(tier, luck, rng, options).item;
  }

  /**
   * 순서: 희귀도 → 슬롯 → (템플릿 확률) 템플릿 선택 또는 절차적 스탯 → affix.
   * 템플릿은 슬롯·희귀도 일치, 요구 레벨 <= playerLevel + 5 인 것만.
   */
  generateDetailed(tier: number, luck: number, rng: Rng, options: LootOptions = {}): LootGeneration {
    assertTier(tier);
    const rarityRoll = options.forcedRarity
      ? null
      : this.rarityService.rollRarityDetailed(tier, luck, rng);
    const rarity = options.forcedRarity ?? rarityRoll?.rarity ?? 'COMMON';
    const slot = options.slot ?? rng.pick(EQUIPMENT_SLOT);
    const maxLevel =
      options.playerLevel !== undefined ? options.playerLevel + LEVEL_HEADROOM : undefined;

    const ownerId = options.ownerId ?? null;
    let template: EquipmentTemplate | null = null;
    if (rng.chance(this.config.get().catalogTemplateChance)) {
      const templates = this.contentLoader.equipmentTemplates({ slot, rarity, maxLevel });
      if (templates.length > 0) template = rng.pick(templates);
    }
    const base = template
      ? fromTemplate(template, ownerId)
      : this.procedural(tier, slot, rarity, maxLevel, ownerId, rng);

    const { prefix, suffix } = this.affixService.rollAffixes(rarity, rng, {
      characterClass: options.characterClass ?? null,
      itemLevel: base.levelRequirement,
    });

    return { item: { ...base, prefix, suffix }, rarityRoll };
  }

  /**
   * Pity 판정으로 감싼 드랍.
   * 강제 드랍이면 롤한 희귀도를 최소 희귀도까지 끌어올리고,
   * 자연 드랍이 캡으로 깎였으면 카운터는 미획득(+1)으로 기록한다.
   */
  rollPityDrop(
    character: CharacterSnapshot,
    contentType: ContentType,
    tier: number,
    rng: Rng,
    options: PityDropOptions = {},
  ): PityDrop {
    assertTier(tier);
    const luck = character.stats.LUCK;
    const baseChance = options.baseChance ?? this.pityService.ruleFor(contentType).baseChance;
    const before = character.pityCounters;
    const decision = this.pityService.shouldDrop(baseChance, luck, before, contentType, rng);

    if (!decision.dropped) {
      return { dropped: false, forcedMinRarity: null, item: null, counters: decision.counters };
    }

    const lootOptions: LootOptions = {
      slot: options.slot,
      characterClass: character.characterClass,
      playerLevel: character.level,
      ownerId: character.id,
    };

    if (decision.forcedMinRarity) {
      const rolled = this.rarityService.rollRarity(tier, luck, rng);
      const item = this.generate(tier, luck, rng, {
        ...lootOptions,
        forcedRarity: maxRarity(rolled, decision.forcedMinRarity),
      });
      return { dropped: true, forcedMinRarity: decision.forcedMinRarity, item, counters: decision.counters };
    }

    const { item, rarityRoll } = this.generateDetailed(tier, luck, rng, lootOptions);
    const counters = rarityRoll?.downgraded
      ? this.pityService.markDryRun(before, contentType)
      : decision.counters;
    return { dropped: true, forcedMinRarity: null, item, counters };
  }

  /** Hard 이상 클리어 시 tier + 1 보장 아이템 */
  generateCompletionBonus(
    tier: number,
    luck: number,
    difficulty: DungeonDifficulty,
    rng: Rng,
    options: LootOptions = {},
  ): EquipmentItem | null {
    if (difficulty === 'NORMAL') return null;
    return this.generate(tier + 1, luck, rng, options);
  }

  enhance(item: EquipmentItem): EquipmentItem {
    if (item.enhancementLevel >= MAX_ENHANCEMENT_LEVEL) {
      throw new InvalidInputError('Equipment is already at max enhancement', {
        itemId: item.id,
        enhancementLevel: item.enhancementLevel,
      });
    }
    return { ...item, enhancementLevel: item.enhancementLevel + 1 };
  }

  /** "<희귀도 단어> <베이스>[ <스탯 접미어>]": Common 은 접미어 없음 */
  generateName(slot: EquipmentSlot, rarity: Rarity, primaryStat: StatType, rng: Rng): string {
    const names = this.contentLoader.names();
    const word = pickOr(names.rarityWords[rarity], rng, titleCase(rarity));
    const base = pickOr(names.slotBases[slot], rng, titleCase(slot));
    if (rarity === 'COMMON') return `${word} ${base}`;

    const suffixes = names.statSuffixes[primaryStat];
    return suffixes && suffixes.length > 0 ? `${word} ${base} ${rng.pick(suffixes)}` : `${word} ${base}`;
  }

  private procedural(
    tier: number,
    slot: EquipmentSlot,
    rarity: Rarity,
    maxLevel: number | undefined,
    ownerId: string | null,
    rng: Rng,
  ): Omit<EquipmentItem, 'prefix' | 'suffix'> {
    const primaryStat = rng.pick(STAT_TYPE);
    const statBonus = this.rarityService.rollStatBonus(rarity, rng);
    const secondary = this.rarityService.rollSecondaryStat(rarity, primaryStat, rng);

    let levelRequirement = Math.max(1, (tier - 1) * 5 + Math.floor(statBonus / 2));
    if (maxLevel !== undefined) {
      levelRequirement = Math.max(1, Math.min(levelRequirement, maxLevel));
    }

    return {
      id: randomUUID(),
      ownerId,
      name: this.generateName(slot, rarity, primaryStat, rng),
      descriptionKey: `equipment.${slot.toLowerCase()}.${rarity.toLowerCase()}`,
      slot,
      rarity,
      primaryStat,
      statBonus,
      secondaryStat: secondary?.stat ?? null,
      secondaryStatBonus: secondary?.bonus ?? 0,
      levelRequirement,
      enhancementLevel: 0,
      templateId: null,
    };
  }
}

function fromTemplate(tpl: EquipmentTemplate, ownerId: string | null): Omit<EquipmentItem, 'prefix' | 'suffix'> {
  return {
    id: randomUUID(),
    ownerId,
    name: tpl.name,
    descriptionKey:
      tpl.descriptionKey || `equipment.${tpl.slot.toLowerCase()}.${tpl.rarity.toLowerCase()}`,
    slot: tpl.slot,
    rarity: tpl.rarity,
    primaryStat: tpl.primaryStat,
    statBonus: tpl.statBonus,
    secondaryStat: tpl.secondaryStat,
    secondaryStatBonus: tpl.secondaryStat ? tpl.secondaryStatBonus : 0,
    levelRequirement: tpl.levelRequirement,
    enhancementLevel: 0,
    templateId: tpl.templateId,
  };
}

function pickOr(list: readonly string[] | undefined, rng: Rng, fallback: string): string {
  return list && list.length > 0 ? rng.pick(list) : fallback;
}

function titleCase(value: string): string {
  return value.charAt(0) + value.slice(1).toLowerCase();
}
