import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import { DropsController } from './drops.controller.js';
import { DropsService } from './drops.service.js';

@Module({
  imports: [EngineModule],
  controllers: [DropsController],
  providers: [DropsService],
})
export class DropsModule {}
