import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { CommonModule } from './common/common.module';
import { DialogueModule } from './dialogue/dialogue.module';
import { SessionsModule } from './sessions/sessions.module';
import { VoicesModule } from './voices/voices.module';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true }), CommonModule, VoicesModule, DialogueModule, SessionsModule],
  controllers: [AppController],
})
export class AppModule {}
