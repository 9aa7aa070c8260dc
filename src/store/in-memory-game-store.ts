// 테스트·로컬 실행용 저장소 (DATABASE_URL 미설정 시)

import type {
  CharacterSnapshot,
  DungeonRun,
  EquipmentItem,
  MonsterCard,
} from '../db/types/index.js';
import type { GameStore } from './game-store.js';

export class InMemoryGameStore implements GameStore {
  private readonly characters = new Map<string, CharacterSnapshot>();
  private readonly equipment = new Map<string, EquipmentItem>();
  private readonly cards = new Map<string, MonsterCard>();
  private readonly runs = new Map<string, DungeonRun>();

  // 저장된 값과 반환 값이 참조를 공유하지 않도록 복사
  async getCharacter(id: string): Promise<CharacterSnapshot | null> {
    const found = this.characters.get(id);
    return found ? structuredClone(found) : null;
  }

  async saveCharacter(character: CharacterSnapshot): Promise<void> {
    this.characters.set(character.id, structuredClone(character));
  }

  async addEquipment(item: EquipmentItem): Promise<void> {
    this.equipment.set(item.id, structuredClone(item));
  }

  async listEquipment(ownerId: string): Promise<EquipmentItem[]> {
    return [...this.equipment.values()]
      .filter((item) => item.ownerId === ownerId)
      .map((item) => structuredClone(item));
  }

  async findCard(ownerId: string, cardId: string): Promise<MonsterCard | null> {
    const found = [...this.cards.values()].find((c) => c.ownerId === ownerId && c.cardId === cardId);
    return found ? structuredClone(found) : null;
  }

  async listCards(ownerId: string): Promise<MonsterCard[]> {
    return [...this.cards.values()]
      .filter((c) => c.ownerId === ownerId)
      .map((c) => structuredClone(c));
  }

  async saveCard(card: MonsterCard): Promise<void> {
    this.cards.set(card.id, structuredClone(card));
  }

  async getRun(id: string): Promise<DungeonRun | null> {
    const found = this.runs.get(id);
    return found ? structuredClone(found) : null;
  }

  async findActiveRun(characterId: string): Promise<DungeonRun | null> {
    const found = [...this.runs.values()].find(
      (r) => r.characterId === characterId && r.status === 'IN_PROGRESS',
    );
    return found ? structuredClone(found) : null;
  }

  async saveRun(run: DungeonRun): Promise<void> {
    this.runs.set(run.id, structuredClone(run));
  }

  // 검사와 쓰기 사이에 await 가 없어 단일 스레드에서 원자적
  async saveRunIfAt(run: DungeonRun, expectedRoomIndex: number): Promise<boolean> {
    const stored = this.runs.get(run.id);
    if (!stored || stored.status !== 'IN_PROGRESS' || stored.currentRoomIndex !== expectedRoomIndex) {
      return false;
    }
    this.runs.set(run.id, structuredClone(run));
    return true;
  }

  // 롤백 없음: 조건부 쓰기를 work 의 첫 단계로 둘 것
  async transaction<T>(work: (store: GameStore) => Promise<T>): Promise<T> {
    return work(this);
  }
}
