import { Module } from '@nestjs/common';
import { AudioStitcherService } from './audio-stitcher.service';

@Module({
  providers: [AudioStitcherService],
  exports: [AudioStitcherService],
})
export class AudioModule {}
