import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { CardsController } from './cards.controller.js';
import { CardsService } from './cards.service.js';

@Module({
  imports: [EngineModule],
  controllers: [CardsController],
  providers: [CardsService],
})
export class CardsModule {}
