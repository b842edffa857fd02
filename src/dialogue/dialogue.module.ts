import { Module } from '@nestjs/common';
import { AudioModule } from '../audio/audio.module';
import { TtsModule } from '../tts/tts.module';
import { DialogueAssemblerService } from './dialogue-assembler.service';
import { DialogueController } from './dialogue.controller';

@Module({
  imports: [TtsModule, AudioModule],
  providers: [DialogueAssemblerService],
  controllers: [DialogueController],
  exports: [DialogueAssemblerService],
})
export class DialogueModule {}
