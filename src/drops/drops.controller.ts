import {
  Body,
  Controller,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { UserId } from '../common/decorators/user-id.decorator.js';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { DropsService } from './drops.service.js';
import { RollDropBodySchema, type RollDropBody } from './dto/roll-drop.dto.js';

@Controller('v1/characters/:characterId/drops')
@UseGuards(AuthGuard)
export class DropsController {
  constructor(private readonly dropsService: DropsService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  async rollDrop(
    @UserId() userId: string,
    @Param('characterId') characterId: string,
    @Body(new ZodValidationPipe(RollDropBodySchema)) body: RollDropBody,
  ) {
    return this.dropsService.rollDrop(userId, characterId, body);
  }
}
