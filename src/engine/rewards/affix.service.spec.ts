import { AffixService } from './affix.service.js';
import { RngService } from '../rng/rng.service.js';
import { scriptedRng } from '../../testing/scripted-rng.js';
import { affixDef, contentWith } from '../../testing/fixtures.js';

describe('AffixService', () => {
  const physical = affixDef({ affixId: 'blazing', bonusType: 'exp_physical_percent', minValue: 3, maxValue: 10 });
  const gold = affixDef({ affixId: 'prosperous', bonusType: 'gold_percent', minValue: 3, maxValue: 8 });
  const warding = affixDef({ affixId: 'of_warding', kind: 'SUFFIX', bonusType: 'defense_flat', minValue: 2, maxValue: 6 });

  let service: AffixService;

  beforeEach(() => {
    service = new AffixService(contentWith({ affixes: [physical, gold, warding] }));
  });

  it('COMMON 은 affix 없음, 난수 소비 없음', () => {
    const rng = scriptedRng();
    expect(service.rollAffixes('COMMON', rng)).toEqual({ prefix: null, suffix: null });
    expect(rng.consumed).toBe(0);
  });

  it('UNCOMMON prefix: 값 = uniform × (1 + lv*0.02) × 0.75, 1자리 반올림', () => {
    // 게이트 0.1 < 0.2, 선택 0.25*2=0.5 → blazing, 값 3 + 0.5*7 = 6.5 → 6.5*1.02*0.75 = 4.9725
    const rng = scriptedRng(0.1, 0.25, 0.5);
    const roll = service.rollAffixes('UNCOMMON', rng);
    expect(roll.prefix).toEqual({
      kind: 'PREFIX',
      affixId: 'blazing',
      name: 'blazing',
      bonusType: 'exp_physical_percent',
      value: 5,
      isGreater: false,
    });
    // UNCOMMON suffix 확률 0 → 게이트 롤 없음
    expect(roll.suffix).toBeNull();
    expect(rng.consumed).toBe(3);
  });

  it('LEGENDARY greater affix: ×1.5 및 플래그', () => {
    // 게이트 0, 선택 0 → blazing, 값 3*1.2*1.5 = 5.4, greater 0.05 < 0.1 → 8.1, suffix 게이트 0.9 ≥ 0.8
    const rng = scriptedRng(0, 0, 0, 0.05, 0.9);
    const roll = service.rollAffixes('LEGENDARY', rng, { itemLevel: 10 });
    expect(roll.prefix?.value).toBe(8.1);
    expect(roll.prefix?.isGreater).toBe(true);
    expect(roll.suffix).toBeNull();
  });

  it('클래스 주 스탯 키워드와 맞는 affix 에 가중치', () => {
    const weights = service.buildWeights([physical, gold], 'STRENGTH');
    expect(weights.map((w) => w.weight)).toEqual([2, 1]);
    expect(service.buildWeights([physical, gold], null).map((w) => w.weight)).toEqual([1, 1]);
  });

  it('같은 롤이라도 전사면 physical 쪽으로 기운다', () => {
    // 선택 롤 0.6: 클래스 없음 → 1.2 → prosperous / 전사 → 1.8 → blazing
    const plain = service.rollAffixes('UNCOMMON', scriptedRng(0.1, 0.6, 0.5));
    const warrior = service.rollAffixes('UNCOMMON', scriptedRng(0.1, 0.6, 0.5), { characterClass: 'WARRIOR' });
    expect(plain.prefix?.affixId).toBe('prosperous');
    expect(warrior.prefix?.affixId).toBe('blazing');
  });

  it('minRarity 미달 affix 는 풀에서 제외 → null', () => {
    const epicOnly = affixDef({ affixId: 'mythic_edge', minRarity: 'EPIC' });
    const svc = new AffixService(contentWith({ affixes: [epicOnly] }));
    // RARE: prefix 게이트 통과(0.1 < 0.5), 풀 비어 null / suffix 게이트 0.9 ≥ 0.3
    expect(svc.rollAffixes('RARE', scriptedRng(0.1, 0.9))).toEqual({ prefix: null, suffix: null });
  });

  it('LEGENDARY 값 범위 (itemLevel 20)', () => {
    const rng = new RngService().seeded('affix-range');
    for (let i = 0; i < 500; i++) {
      const { prefix, suffix } = service.rollAffixes('LEGENDARY', rng, { itemLevel: 20 });
      expect(prefix).not.toBeNull();
      if (prefix) {
        const def = prefix.affixId === 'blazing' ? physical : gold;
        const min = def.minValue * 1.4 * 1.5;
        const max = def.maxValue * 1.4 * 1.5 * (prefix.isGreater ? 1.5 : 1);
        expect(prefix.value).toBeGreaterThanOrEqual(Math.round(min * 10) / 10);
        expect(prefix.value).toBeLessThanOrEqual(Math.round(max * 10) / 10);
      }
      if (suffix) {
        expect(suffix.affixId).toBe('of_warding');
      }
    }
  });
});
