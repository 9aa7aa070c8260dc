import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { RarityService } from './rewards/rarity.service.js';
import { AffixService } from './rewards/affix.service.js';
import { PityService } from './rewards/pity.service.js';
import { LootService } from './rewards/loot.service.js';
import { CardDropService } from './cards/card-drop.service.js';
import { EncounterService } from './dungeon/encounter.service.js';
import { DungeonRunService } from './dungeon/dungeon-run.service.js';
import { RoomPlannerService } from './planner/room-planner.service.js';

const providers = [
  // Layer 1: 난수
  RngService,
  // Layer 2: 희귀도·스탯·affix
  RarityService,
  AffixService,
  // Layer 3: pity + 루트 조립
  PityService,
  LootService,
  // Layer 4: 카드
  CardDropService,
  // Layer 5: 던전
  RoomPlannerService,
  EncounterService,
  DungeonRunService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
