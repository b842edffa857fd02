import { Inject, Injectable, Logger } from '@nestjs/common';
import { DescribeVoicesCommand, PollyClient, Voice as PollyVoice, VoiceId } from '@aws-sdk/client-polly';
import { POLLY_CLIENT } from '../polly/polly.constants';
import { CatalogUnavailableError, describeCause } from '../domain/errors';
import { isQualityTier, QualityTier, Voice } from '../domain/types';

const PREFERRED_LANGUAGE = 'en-US';

@Injectable()
export class VoiceCatalogService {
  private readonly logger = new Logger(VoiceCatalogService.name);
  private voices: Promise<Voice[]> | null = null;
  private pollyVoiceIds = new Map<string, VoiceId>();

  constructor(@Inject(POLLY_CLIENT) private readonly polly: PollyClient) {}

  /**
   * Every voice Polly offers, fetched on first use and kept for the life of the process.
   * Callers that arrive while the first fetch is in flight share it; a failed fetch is
   * not cached so the next caller tries again.
   */
  fetchAll(): Promise<Voice[]> {
    if (!this.voices) {
      this.voices = this.describeAllVoices().catch((error: unknown) => {
        this.voices = null;
        this.logger.error(`Failed to fetch Polly voices: ${describeCause(error)}`);
        throw new CatalogUnavailableError(error);
      });
    }
    return this.voices;
  }

  /** The id to send to SynthesizeSpeech for a catalog voice, or undefined when Polly did not list it. */
  async resolvePollyVoiceId(voiceId: string): Promise<VoiceId | undefined> {
    await this.fetchAll();
    return this.pollyVoiceIds.get(voiceId);
  }

  async filter(languageCode: string, qualityTier: QualityTier): Promise<Voice[]> {
    const voices = await this.fetchAll();
    return voices
      .filter((voice) => voice.languageCode === languageCode && voice.supportedTiers.includes(qualityTier))
      .sort((a, b) => a.id.localeCompare(b.id));
  }

  async listLanguages(): Promise<string[]> {
    const voices = await this.fetchAll();
    return [...new Set(voices.map((voice) => voice.languageCode))].sort();
  }

  async defaultLanguage(): Promise<string> {
    const languages = await this.listLanguages();
    if (languages.includes(PREFERRED_LANGUAGE)) {
      return PREFERRED_LANGUAGE;
    }
    return languages[0] ?? PREFERRED_LANGUAGE;
  }

  private async describeAllVoices(): Promise<Voice[]> {
    const voices: Voice[] = [];
    const pollyVoiceIds = new Map<string, VoiceId>();
    let nextToken: string | undefined;
    do {
      const response = await this.polly.send(new DescribeVoicesCommand({ NextToken: nextToken }));
      for (const raw of response.Voices ?? []) {
        const voice = this.toVoice(raw);
        if (voice) {
          voices.push(voice);
        }
        if (raw.Id) {
          pollyVoiceIds.set(raw.Id, raw.Id);
        }
      }
      nextToken = response.NextToken;
    } while (nextToken);

    this.pollyVoiceIds = pollyVoiceIds;
    this.logger.log(`Loaded ${voices.length} Polly voices`);
    return voices;
  }

  private toVoice(raw: PollyVoice): Voice | null {
    const id = raw.Id ?? raw.Name;
    if (!id || !raw.LanguageCode) {
      return null;
    }
    return {
      id,
      name: raw.Name ?? id,
      languageCode: raw.LanguageCode,
      languageName: raw.LanguageName,
      gender: raw.Gender,
      supportedTiers: (raw.SupportedEngines ?? []).filter(isQualityTier),
    };
  }
}
