import { Global, Module } from '@nestjs/common';
import { ContentLoaderService } from './content-loader.service.js';

@Global()
@Module({
  providers: [ContentLoaderService],
  exports: [ContentLoaderService],
})
export class ContentModule {}
