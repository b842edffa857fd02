import { Module } from '@nestjs/common';
import { DialogueModule } from '../dialogue/dialogue.module';
import { VoicesModule } from '../voices/voices.module';
import { SessionsController } from './sessions.controller';
import { SessionsService } from './sessions.service';

@Module({
  imports: [VoicesModule, DialogueModule],
  providers: [SessionsService],
  controllers: [SessionsController],
  exports: [SessionsService],
})
export class SessionsModule {}
