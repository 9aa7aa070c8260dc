import { Controller, Get, Param, UseGuards } from '@nestjs/common';
import { AuthGuard } from '../common/guards/auth.guard.js';
import { UserId } from '../common/decorators/user-id.decorator.js';
import { CardsService } from './cards.service.js';

@Controller('v1/characters/:characterId/cards')
@UseGuards(AuthGuard)
export class CardsController {
  constructor(private readonly cardsService: CardsService) {}

  @Get()
  async listCards(@UserId() userId: string, @Param('characterId') characterId: string) {
    return this.cardsService.listCards(userId, characterId);
  }
}
