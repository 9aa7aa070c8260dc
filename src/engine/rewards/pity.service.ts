// Pity 카운터: contentType별 연속 미획득이 임계값에 닿으면 드랍 강제 + 최소 희귀도

import { Injectable, Logger } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import { InvalidInputError } from '../../common/errors/game-errors.js';
import {
  CONTENT_TYPE,
  type ContentType,
  type PityCounters,
  type Rarity,
} from '../../db/types/index.js';
import type { Rng } from '../rng/rng.service.js';
import { assertLuck } from './rarity.service.js';

export interface PityRule {
  threshold: number;
  minRarity: Rarity;
  baseChance: number;
  luckScaling: number;
}

const DEFAULT_LUCK_SCALING = 0.003;

export const DEFAULT_PITY_RULES: Record<ContentType, PityRule> = {
  tasks: { threshold: 20, minRarity: 'UNCOMMON', baseChance: 0.1, luckScaling: DEFAULT_LUCK_SCALING },
  dungeons: { threshold: 12, minRarity: 'RARE', baseChance: 0.3, luckScaling: DEFAULT_LUCK_SCALING },
  missions: { threshold: 5, minRarity: 'RARE', baseChance: 0.1, luckScaling: DEFAULT_LUCK_SCALING },
  expeditions: { threshold: 3, minRarity: 'EPIC', baseChance: 0.5, luckScaling: DEFAULT_LUCK_SCALING },
};

export interface PityDecision {
  dropped: boolean;
  // 강제 드랍일 때만 값이 있음
  forcedMinRarity: Rarity | null;
  counters: PityCounters;
}

@Injectable()
export class PityService {
  private readonly logger = new Logger(PityService.name);

  constructor(private readonly contentLoader: ContentLoaderService) {}

  /** 카탈로그 DropRateRule 이 있으면 필드 단위로 덮어씀 */
  ruleFor(contentType: ContentType): PityRule {
    assertContentType(contentType);
    const base = DEFAULT_PITY_RULES[contentType];
    const override = this.contentLoader.dropRate(contentType);
    if (!override) return base;
    return {
      threshold: override.pityThreshold ?? base.threshold,
      minRarity: override.pityMinRarity ?? base.minRarity,
      baseChance: override.baseChance ?? base.baseChance,
      luckScaling: override.luckScaling ?? base.luckScaling,
    };
  }

  /**
   * counter >= threshold → 강제 드랍(카운터 0).
   * 아니면 uniform <= baseChance + luck*scaling 으로 판정, 성공 시 0 / 실패 시 +1.
   * 입력 counters 는 변경하지 않는다.
   */
  shouldDrop(
    baseChance: number,
    luck: number,
    counters: PityCounters,
    contentType: ContentType,
    rng: Rng,
  ): PityDecision {
    if (!(baseChance >= 0 && baseChance <= 1)) {
      throw new InvalidInputError('baseChance must be within [0, 1]', { baseChance });
    }
    assertLuck(luck);
    const rule = this.ruleFor(contentType);
    const current = counters[contentType] ?? 0;

    if (current >= rule.threshold) {
      this.logger.log(
        `pity triggered: ${contentType} after ${current} dry runs → min ${rule.minRarity}`,
      );
      return {
        dropped: true,
        forcedMinRarity: rule.minRarity,
        counters: withCounter(counters, contentType, 0),
      };
    }

    const dropped = rng.next() <= baseChance + luck * rule.luckScaling;
    return {
      dropped,
      forcedMinRarity: null,
      counters: withCounter(counters, contentType, dropped ? 0 : current + 1),
    };
  }

  /** 드랍은 됐지만 캡으로 희귀도가 깎인 경우: 미획득으로 취급 */
  markDryRun(counters: PityCounters, contentType: ContentType): PityCounters {
    return withCounter(counters, contentType, (counters[contentType] ?? 0) + 1);
  }
}

function withCounter(counters: PityCounters, contentType: ContentType, value: number): PityCounters {
  const next: PityCounters = { ...counters };
  next[contentType] = value;
  return next;
}

function assertContentType(value: string): asserts value is ContentType {
  if (!CONTENT_TYPE.some((t) => t === value)) {
    throw new InvalidInputError('unknown contentType', { contentType: value });
  }
}
