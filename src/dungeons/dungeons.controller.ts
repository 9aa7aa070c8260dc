import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { UserId } from '../common/decorators/user-id.decorator.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { DungeonsService } from './dungeons.service.js';
import { AdvanceRunBodySchema, type AdvanceRunBody } from './dto/advance-run.dto.js';
import { StartRunBodySchema, type StartRunBody } from './dto/start-run.dto.js';

@Controller('v1')
@UseGuards(AuthGuard)
export class DungeonsController {
  constructor(private readonly dungeonsService: DungeonsService) {}

  @Post('characters/:characterId/dungeon-runs')
  @HttpCode(HttpStatus.CREATED)
  async startRun(
    @UserId() userId: string,
    @Param('characterId') characterId: string,
    @Body(new ZodValidationPipe(StartRunBodySchema)) body: StartRunBody,
  ) {
    return this.dungeonsService.startRun(userId, characterId, body);
  }

  @Post('dungeon-runs/:runId/advance')
  @HttpCode(HttpStatus.OK)
  async advance(
    @UserId() userId: string,
    @Param('runId') runId: string,
    @Body(new ZodValidationPipe(AdvanceRunBodySchema)) body: AdvanceRunBody,
  ) {
    return this.dungeonsService.advance(userId, runId, body);
  }

  @Post('dungeon-runs/:runId/abandon')
  @HttpCode(HttpStatus.OK)
  async abandon(@UserId() userId: string, @Param('runId') runId: string) {
    return this.dungeonsService.abandon(userId, runId);
  }

  @Get('dungeon-runs/:runId')
  async getRun(@UserId() userId: string, @Param('runId') runId: string) {
    return this.dungeonsService.getRun(userId, runId);
  }
}
