import { BadRequestException, Controller, Get, Query } from '@nestjs/common';
import { CatalogUnavailableError, NoVoicesForFilterError } from '../domain/errors';
import { isQualityTier } from '../domain/types';
import { VoiceCatalogService } from './voice-catalog.service';

@Controller('voices')
export class VoicesController {
  constructor(private readonly voiceCatalog: VoiceCatalogService) {}

  @Get()
  async listVoices(@Query('language') language?: string, @Query('quality') quality?: string) {
    const qualityTier = (quality || 'generative').toLowerCase();
    if (!isQualityTier(qualityTier)) {
      throw new BadRequestException('quality must be either "generative" or "neural"');
    }
    const languageCode = language?.trim() || (await this.voiceCatalog.defaultLanguage());
    const voices = await this.voiceCatalog.filter(languageCode, qualityTier);
    if (!voices.length) {
      return {
        language: languageCode,
        quality: qualityTier,
        voices,
        message: new NoVoicesForFilterError(languageCode, qualityTier).message,
      };
    }
    return { language: languageCode, quality: qualityTier, voices };
  }

  @Get('languages')
  async listLanguages() {
    const [languages, defaultLanguage] = await Promise.all([
      this.voiceCatalog.listLanguages(),
      this.voiceCatalog.defaultLanguage(),
    ]);
    return { languages, defaultLanguage };
  }

  @Get('health')
  async health() {
    try {
      const voices = await this.voiceCatalog.fetchAll();
      return { ok: true, voiceCount: voices.length };
    } catch (error) {
      if (error instanceof CatalogUnavailableError) {
        return { ok: false, message: error.message };
      }
      throw error;
    }
  }
}
