import { RarityService, assertRarity } from './rarity.service.js';
import { RngService } from '../rng/rng.service.js';
import { InvalidInputError } from '../../common/errors/game-errors.js';
import { RARITY, STAT_BONUS_RANGE, type Rarity } from '../../db/types/index.js';
import { scriptedRng } from '../../testing/scripted-rng.js';

describe('RarityService', () => {
  let service: RarityService;
  const rngs = new RngService();

  beforeEach(() => {
    service = new RarityService();
  });

  describe('rollRarityDetailed: 임계값', () => {
    it('보정 롤 53 → UNCOMMON (롤 1회만 소비)', () => {
      const rng = scriptedRng(0.5);
      // 50 + 0*0.5 + 1*3 = 53
      expect(service.rollRarityDetailed(1, 0, rng)).toEqual({
        rarity: 'UNCOMMON',
        rawRarity: 'UNCOMMON',
        downgraded: false,
      });
      expect(rng.consumed).toBe(1);
    });

    it('보정 롤 13 → COMMON', () => {
      expect(service.rollRarity(1, 0, scriptedRng(0.1))).toBe('COMMON');
    });

    it('tier 4 에서는 Legendary 가능', () => {
      // 95 + 12 = 107
      expect(service.rollRarity(4, 0, scriptedRng(0.95))).toBe('LEGENDARY');
    });
  });

  describe('rollRarityDetailed: 캡', () => {
    it('tier 3 Legendary → Epic 하드캡 (소프트캡 없음)', () => {
      const rng = scriptedRng(0.99);
      expect(service.rollRarityDetailed(3, 0, rng)).toEqual({
        rarity: 'EPIC',
        rawRarity: 'LEGENDARY',
        downgraded: true,
      });
      expect(rng.consumed).toBe(1);
    });

    it('tier 1 Epic 유지 확률 실패 → UNCOMMON', () => {
      // 85 + 3 = 88 → EPIC, 유지 확률 0.02 에 0.5 실패
      expect(service.rollRarityDetailed(1, 0, scriptedRng(0.85, 0.5))).toEqual({
        rarity: 'UNCOMMON',
        rawRarity: 'EPIC',
        downgraded: true,
      });
    });

    it('tier 1 Epic 유지 확률 통과 → EPIC 유지', () => {
      expect(service.rollRarityDetailed(1, 0, scriptedRng(0.85, 0.01))).toEqual({
        rarity: 'EPIC',
        rawRarity: 'EPIC',
        downgraded: false,
      });
    });

    it('tier 2 Legendary → Epic → 유지 실패 시 RARE', () => {
      // 85 + 10*0.5 + 2*3 = 96 → LEGENDARY, 하드캡 EPIC, 유지 확률 0.05 + 10*0.005 = 0.1
      expect(service.rollRarityDetailed(2, 10, scriptedRng(0.85, 0.5))).toEqual({
        rarity: 'RARE',
        rawRarity: 'LEGENDARY',
        downgraded: true,
      });
    });

    it('tier 1, luck 5 로 10,000회 → Legendary 0, Epic 극소수', () => {
      const rng = rngs.seeded('tier-one-luck-five');
      const counts: Record<Rarity, number> = {
        COMMON: 0,
        UNCOMMON: 0,
        RARE: 0,
        EPIC: 0,
        LEGENDARY: 0,
      };
      for (let i = 0; i < 10_000; i++) {
        counts[service.rollRarity(1, 5, rng)]++;
      }
      expect(counts.LEGENDARY).toBe(0);
      // raw Epic 이상 약 23.5% × 유지 확률 3.5% ≈ 0.8%
      expect(counts.EPIC).toBeLessThan(200);
      expect(counts.COMMON).toBeGreaterThan(0);
    });

    it('tier 1~3 어떤 luck 에서도 Legendary 없음', () => {
      const rng = rngs.seeded('no-legendary-below-four');
      for (let tier = 1; tier <= 3; tier++) {
        for (let luck = 0; luck <= 100; luck += 10) {
          for (let i = 0; i < 50; i++) {
            expect(service.rollRarity(tier, luck, rng)).not.toBe('LEGENDARY');
          }
        }
      }
    });
  });

  describe('입력 검증', () => {
    it('tier < 1 → InvalidInputError', () => {
      expect(() => service.rollRarity(0, 0, scriptedRng(0.5))).toThrow(InvalidInputError);
      expect(() => service.rollRarity(1.5, 0, scriptedRng(0.5))).toThrow(InvalidInputError);
    });

    it('음수 luck → InvalidInputError', () => {
      expect(() => service.rollRarity(1, -1, scriptedRng(0.5))).toThrow(InvalidInputError);
    });

    it('알 수 없는 희귀도 문자열 → InvalidInputError', () => {
      const bogus: unknown = JSON.parse('"MYTHIC"');
      expect(() => assertRarity(bogus)).toThrow(InvalidInputError);
    });
  });

  describe('rollStatBonus', () => {
    it.each(RARITY.map((r) => [r]))('%s 보너스는 범위 안', (rarity) => {
      const rng = rngs.seeded(`stat-${rarity}`);
      const [min, max] = STAT_BONUS_RANGE[rarity];
      const seen = new Set<number>();
      for (let i = 0; i < 1000; i++) {
        const bonus = service.rollStatBonus(rarity, rng);
        expect(bonus).toBeGreaterThanOrEqual(min);
        expect(bonus).toBeLessThanOrEqual(max);
        seen.add(bonus);
      }
      expect(seen.has(min)).toBe(true);
      expect(seen.has(max)).toBe(true);
    });
  });

  describe('rollSecondaryStat', () => {
    it('COMMON → null, 난수 소비 없음', () => {
      const rng = scriptedRng();
      expect(service.rollSecondaryStat('COMMON', 'STRENGTH', rng)).toBeNull();
      expect(rng.consumed).toBe(0);
    });

    it('UNCOMMON 확률 실패 → null', () => {
      expect(service.rollSecondaryStat('UNCOMMON', 'STRENGTH', scriptedRng(0.5))).toBeNull();
    });

    it('주 스탯을 제외한 풀에서 선택', () => {
      // 풀: WISDOM, CHARISMA, DEXTERITY, LUCK, DEFENSE
      expect(service.rollSecondaryStat('UNCOMMON', 'STRENGTH', scriptedRng(0.1, 0, 0.99))).toEqual({
        stat: 'WISDOM',
        bonus: 2,
      });
    });

    it('LEGENDARY 는 항상 보조 스탯 (5~10), 주 스탯과 다름', () => {
      const rng = rngs.seeded('legendary-secondary');
      for (let i = 0; i < 300; i++) {
        const roll = service.rollSecondaryStat('LEGENDARY', 'LUCK', rng);
        expect(roll).not.toBeNull();
        expect(roll?.stat).not.toBe('LUCK');
        expect(roll?.bonus).toBeGreaterThanOrEqual(5);
        expect(roll?.bonus).toBeLessThanOrEqual(10);
      }
    });
  });
});
