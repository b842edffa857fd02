import { BadRequestException, Body, Controller, Delete, Get, HttpCode, Param, Patch, Post, Res } from '@nestjs/common';
import { parsePause, parseQualityTier, parseSampleRate } from '../dialogue/dialogue-input';
import { abortOnDisconnect, artifactOrThrow, DownloadResponse, sendArtifact } from '../dialogue/dialogue-response';
import { TurnUpdate } from './dialogue-session';
import { SessionsService, SettingsInput } from './sessions.service';

@Controller('sessions')
export class SessionsController {
  constructor(private readonly sessionsService: SessionsService) {}

  @Post()
  async createSession(
    @Body('language') language?: unknown,
    @Body('qualityTier') qualityTier?: unknown,
    @Body('sampleRate') sampleRate?: unknown,
  ) {
    const session = await this.sessionsService.createSession(this.parseSettings(language, qualityTier, sampleRate));
    return this.sessionsService.toView(session);
  }

  @Get(':id')
  getSession(@Param('id') id: string) {
    return this.sessionsService.toView(this.sessionsService.getSession(id));
  }

  @Patch(':id/settings')
  async updateSettings(
    @Param('id') id: string,
    @Body('language') language?: unknown,
    @Body('qualityTier') qualityTier?: unknown,
    @Body('sampleRate') sampleRate?: unknown,
  ) {
    const session = await this.sessionsService.updateSettings(id, this.parseSettings(language, qualityTier, sampleRate));
    return this.sessionsService.toView(session);
  }

  @Post(':id/turns')
  addTurn(@Param('id') id: string) {
    this.sessionsService.addTurn(id);
    return this.sessionsService.toView(this.sessionsService.getSession(id));
  }

  @Patch(':id/turns/:turnId')
  updateTurn(
    @Param('id') id: string,
    @Param('turnId') turnId: string,
    @Body('voiceId') voiceId?: unknown,
    @Body('rawText') rawText?: unknown,
    @Body('pauseAfterMs') pauseAfterMs?: unknown,
  ) {
    const updates: TurnUpdate = {};
    if (voiceId !== undefined) {
      if (typeof voiceId !== 'string' || !voiceId.trim()) {
        throw new BadRequestException('voiceId must be a non-empty string');
      }
      updates.voiceId = voiceId.trim();
    }
    if (rawText !== undefined) {
      if (typeof rawText !== 'string') {
        throw new BadRequestException('rawText must be a string');
      }
      updates.rawText = rawText;
    }
    if (pauseAfterMs !== undefined) {
      updates.pauseAfterMs = parsePause(pauseAfterMs);
    }
    this.sessionsService.updateTurn(id, turnId, updates);
    return this.sessionsService.toView(this.sessionsService.getSession(id));
  }

  @Delete(':id/turns/:turnId')
  removeTurn(@Param('id') id: string, @Param('turnId') turnId: string) {
    this.sessionsService.removeTurn(id, turnId);
    return this.sessionsService.toView(this.sessionsService.getSession(id));
  }

  @Delete(':id')
  @HttpCode(204)
  deleteSession(@Param('id') id: string) {
    this.sessionsService.deleteSession(id);
  }

  @Post(':id/generate')
  async generate(@Param('id') id: string, @Res() res: DownloadResponse) {
    const outcome = await this.sessionsService.generate(id, abortOnDisconnect(res));
    sendArtifact(res, artifactOrThrow(outcome));
  }

  private parseSettings(language: unknown, qualityTier: unknown, sampleRate: unknown): SettingsInput {
    if (language !== undefined && (typeof language !== 'string' || !language.trim())) {
      throw new BadRequestException('language must be a non-empty string');
    }
    return {
      languageCode: typeof language === 'string' ? language.trim() : undefined,
      qualityTier: qualityTier === undefined ? undefined : parseQualityTier(qualityTier),
      sampleRate: sampleRate === undefined ? undefined : parseSampleRate(sampleRate),
    };
  }
}
