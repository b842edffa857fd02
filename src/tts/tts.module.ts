import { Module } from '@nestjs/common';
import { PollyModule } from '../polly/polly.module';
import { VoicesModule } from '../voices/voices.module';
import { PollySynthesisClient } from './polly-synthesis.client';
import { SYNTHESIS_CLIENT } from './tts.constants';

@Module({
  imports: [PollyModule, VoicesModule],
  providers: [
    {
      provide: SYNTHESIS_CLIENT,
      useClass: PollySynthesisClient,
    },
  ],
  exports: [SYNTHESIS_CLIENT],
})
export class TtsModule {}
