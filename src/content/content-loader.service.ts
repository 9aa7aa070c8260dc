// 카탈로그 로드 + 메모리 캐시: remote 우선, 섹션 단위로 static 폴백

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { AppConfigService } from '../config/app-config.service.js';
import { InternalError } from '../common/errors/game-errors.js';
import { ENCOUNTER_TYPE } from '../db/types/index.js';
import type {
  AffixKind,
  CardDefinition,
  ContentType,
  DungeonDefinition,
  EncounterType,
  EquipmentSlot,
  Rarity,
  RoomApproach,
} from '../db/types/index.js';
import {
  AffixDefinitionSchema,
  ApproachTableSchema,
  CardDefinitionSchema,
  CatalogSchema,
  DropRateRuleSchema,
  DungeonDefinitionSchema,
  EMPTY_NAME_TABLES,
  EquipmentTemplateSchema,
  NameTablesSchema,
  emptyCatalog,
  type AffixDefinition,
  type Catalog,
  type CatalogSource,
  type DropRateRule,
  type EquipmentTemplate,
  type NameTables,
} from './content.types.js';

export interface TemplateQuery {
  slot?: EquipmentSlot;
  rarity?: Rarity;
  maxLevel?: number;
}

@Injectable()
export class ContentLoaderService implements OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);
  private source: CatalogSource = { kind: 'STATIC', catalog: emptyCatalog() };

  constructor(private readonly config: AppConfigService) {}

  async onModuleInit() {
    await this.load();
  }

  async load(): Promise<CatalogSource> {
    const { contentDir, staticContentDir } = this.config.get();
    const fallback = await this.loadStatic(staticContentDir);
    const remote = await this.loadRemote(contentDir);

    this.source = remote
      ? {
          kind: 'REMOTE',
          version: remote.version,
          loadedAt: new Date().toISOString(),
          catalog: mergeCatalog(remote.catalog, fallback),
        }
      : { kind: 'STATIC', catalog: fallback };

    const c = this.source.catalog;
    this.logger.log(
      `catalog loaded from ${this.source.kind}: equipment=${c.equipment.length} affixes=${c.affixes.length} cards=${c.cards.length} dungeons=${c.dungeons.length}`,
    );
    return this.source;
  }

  /** 외부에서 준비한 카탈로그로 교체 (핫 리로드, 테스트) */
  useSource(source: CatalogSource): void {
    this.source = source;
  }

  equipmentTemplates(query: TemplateQuery = {}): EquipmentTemplate[] {
    const { maxLevel } = query;
    return this.source.catalog.equipment.filter(
      (t) =>
        t.active &&
        (query.slot === undefined || t.slot === query.slot) &&
        (query.rarity === undefined || t.rarity === query.rarity) &&
        (maxLevel === undefined || t.levelRequirement <= maxLevel),
    );
  }

  affixes(kind: AffixKind): AffixDefinition[] {
    return this.source.catalog.affixes.filter((a) => a.active && a.kind === kind);
  }

  cardPool(): CardDefinition[] {
    return this.source.catalog.cards.filter((c) => c.active);
  }

  dropRate(contentType: ContentType): DropRateRule | undefined {
    return this.source.catalog.dropRates.find((r) => r.contentType === contentType);
  }

  dungeon(dungeonId: string): DungeonDefinition | undefined {
    return this.source.catalog.dungeons.find((d) => d.dungeonId === dungeonId && d.active);
  }

  dungeons(): DungeonDefinition[] {
    return this.source.catalog.dungeons.filter((d) => d.active);
  }

  approaches(encounterType: EncounterType): RoomApproach[] {
    return this.source.catalog.approaches[encounterType] ?? [];
  }

  names(): NameTables {
    return this.source.catalog.names;
  }

  private async loadRemote(dir: string): Promise<{ version: string; catalog: Catalog } | null> {
    const path = join(dir, 'catalog.json');
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      this.logger.warn(`remote catalog unavailable (${path}): ${describe(err)}; using static catalog`);
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.logger.warn(`remote catalog is not valid JSON: ${describe(err)}; using static catalog`);
      return null;
    }

    const parsed = CatalogSchema.safeParse(json);
    if (!parsed.success) {
      this.logger.warn(
        `remote catalog failed validation: ${formatIssues(parsed.error).join('; ')}; using static catalog`,
      );
      return null;
    }

    const { version, names, ...sections } = parsed.data;
    return { version, catalog: { ...sections, names: names ?? EMPTY_NAME_TABLES } };
  }

  private async loadStatic(dir: string): Promise<Catalog> {
    const [equipment, affixes, cards, dungeons, approaches, dropRates, names] = await Promise.all([
      readSection(dir, 'equipment.json', z.array(EquipmentTemplateSchema)),
      readSection(dir, 'affixes.json', z.array(AffixDefinitionSchema)),
      readSection(dir, 'cards.json', z.array(CardDefinitionSchema)),
      readSection(dir, 'dungeons.json', z.array(DungeonDefinitionSchema)),
      readSection(dir, 'approaches.json', ApproachTableSchema),
      readSection(dir, 'drop-rates.json', z.array(DropRateRuleSchema), '[]'),
      readSection(dir, 'names.json', NameTablesSchema, JSON.stringify(EMPTY_NAME_TABLES)),
    ]);
    return { equipment, affixes, cards, dungeons, approaches, dropRates, names };
  }
}

/** remote 섹션이 비어 있으면 static 섹션 사용 */
export function mergeCatalog(remote: Catalog, fallback: Catalog): Catalog {
  const pick = <T>(primary: T[], secondary: T[]): T[] =>
    primary.length > 0 ? primary : secondary;

  const approaches: Catalog['approaches'] = { ...fallback.approaches };
  for (const type of ENCOUNTER_TYPE) {
    const list = remote.approaches[type];
    if (list && list.length > 0) approaches[type] = list;
  }

  const remoteHasNames = Object.keys(remote.names.slotBases).length > 0;
  return {
    equipment: pick(remote.equipment, fallback.equipment),
    affixes: pick(remote.affixes, fallback.affixes),
    cards: pick(remote.cards, fallback.cards),
    dropRates: pick(remote.dropRates, fallback.dropRates),
    dungeons: pick(remote.dungeons, fallback.dungeons),
    approaches,
    names: remoteHasNames ? remote.names : fallback.names,
  };
}

async function readSection<T>(
  dir: string,
  file: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  whenMissing?: string,
): Promise<T> {
  const path = join(dir, file);
  const raw = await readFile(path, 'utf-8').catch((err: unknown) => {
    if (whenMissing !== undefined) return whenMissing;
    throw new InternalError(`static catalog section missing: ${file}`, { path, cause: describe(err) });
  });
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new InternalError(`static catalog section is not valid JSON: ${file}`, { path, cause: describe(err) });
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new InternalError(`static catalog section invalid: ${file}`, {
      issues: formatIssues(parsed.error),
    });
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
