import { Module } from '@nestjs/common';
import { PollyModule } from '../polly/polly.module';
import { VoiceCatalogService } from './voice-catalog.service';
import { VoicesController } from './voices.controller';

@Module({
  imports: [PollyModule],
  providers: [VoiceCatalogService],
  controllers: [VoicesController],
  exports: [VoiceCatalogService],
})
export class VoicesModule {}
