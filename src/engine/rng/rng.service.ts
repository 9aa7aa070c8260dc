// 난수원 주입: 운영은 crypto 기반(비결정), 테스트는 splitmix64 seed 또는 스크립트 시퀀스

import { Injectable } from '@nestjs/common';
import { randomBytes } from 'crypto';
import { InvalidInputError } from '../../common/errors/game-errors.js';

/** [0, 1) 실수를 내놓는 원천 */
export interface RandomSource {
  next(): number;
}

const TWO_POW_48 = 2 ** 48;
const TWO_POW_53 = 2 ** 53;
const MASK_64 = 0xFFFFFFFFFFFFFFFFn;

export class CryptoRandomSource implements RandomSource {
  next(): number {
    return randomBytes(6).readUIntBE(0, 6) / TWO_POW_48;
  }
}

export class SplitMix64Source implements RandomSource {
  private state: bigint;
  private _cursor: number;

  constructor(seed: string, cursor: number = 0) {
    this.state = hashSeed(seed);
    this._cursor = cursor;
    for (let i = 0; i < cursor; i++) {
      this.advanceState();
    }
  }

  next(): number {
    this._cursor++;
    this.advanceState();
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xBF58476D1CE4E5B9n) & MASK_64;
    z = ((z ^ (z >> 27n)) * 0x94D049BB133111EBn) & MASK_64;
    z = (z ^ (z >> 31n)) & MASK_64;
    // 상위 53비트만 사용해 1.0이 나오지 않게 한다
    return Number(z >> 11n) / TWO_POW_53;
  }

  get cursor(): number {
    return this._cursor;
  }

  private advanceState(): void {
    this.state = (this.state + 0x9E3779B97F4A7C15n) & MASK_64;
  }
}

function hashSeed(seed: string): bigint {
  let h = 0n;
  for (let i = 0; i < seed.length; i++) {
    h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & MASK_64;
  }
  return h === 0n ? 1n : h;
}

export interface Weighted<T> {
  item: T;
  weight: number;
}

export class Rng {
  private _consumed = 0;

  constructor(private readonly source: RandomSource) {}

  /** 0.0 이상 1.0 미만 */
  next(): number {
    this._consumed++;
    return this.source.next();
  }

  /** min~max 정수 (inclusive) */
  range(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** min 이상 max 미만 실수 */
  float(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  /** probability(0~1) 확률로 true */
  chance(probability: number): boolean {
    return this.next() < probability;
  }

  pick<T>(items: readonly T[]): T {
    if (items.length === 0) {
      throw new InvalidInputError('Cannot pick from an empty list');
    }
    return items[Math.floor(this.next() * items.length)];
  }

  /** 누적 가중치 선택: 가중치 합이 0 이하이면 null */
  weighted<T>(entries: readonly Weighted<T>[]): T | null {
    if (entries.length === 0) return null;

    const totalWeight = entries.reduce((sum, e) => sum + Math.max(0, e.weight), 0);
    if (totalWeight <= 0) return null;

    let roll = this.next() * totalWeight;
    for (const entry of entries) {
      roll -= Math.max(0, entry.weight);
      if (roll <= 0) return entry.item;
    }

    return entries[entries.length - 1].item;
  }

  /** Fisher-Yates: 원본은 건드리지 않음 */
  shuffle<T>(items: readonly T[]): T[] {
    const out = [...items];
    for (let i = out.length - 1; i > 0; i--) {
      const j = Math.floor(this.next() * (i + 1));
      [out[i], out[j]] = [out[j], out[i]];
    }
    return out;
  }

  get consumed(): number {
    return this._consumed;
  }
}

@Injectable()
export class RngService {
  /** 게임플레이용 비결정 RNG */
  create(): Rng {
    return new Rng(new CryptoRandomSource());
  }

  /** seed + cursor 기반 결정적 RNG (시뮬레이션·테스트) */
  seeded(seed: string, cursor: number = 0): Rng {
    return new Rng(new SplitMix64Source(seed, cursor));
  }
}
