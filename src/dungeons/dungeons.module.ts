import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { DungeonsController } from './dungeons.controller.js';
import { DungeonsService } from './dungeons.service.js';

@Module({
  imports: [EngineModule],
  controllers: [DungeonsController],
  providers: [DungeonsService],
})
export class DungeonsModule {}
