import { Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { v4 as uuid } from 'uuid';
import { InMemoryStoreService } from '../common/in-memory-store.service';
import {
  DialogueLimits,
  getDefaultQualityTier,
  getDefaultSampleRate,
  getDialogueLimits,
  getSessionTtlMs,
} from '../config/dialogue.config';
import { AssemblyOutcome, DialogueSettings, QualityTier, SampleRate, Turn, Voice } from '../domain/types';
import { DialogueAssemblerService } from '../dialogue/dialogue-assembler.service';
import { VoiceCatalogService } from '../voices/voice-catalog.service';
import { DialogueSession, TurnUpdate } from './dialogue-session';

export interface SettingsInput {
  languageCode?: string;
  qualityTier?: QualityTier;
  sampleRate?: SampleRate;
}

export interface TurnView extends Turn {
  charactersRemaining: number;
}

export interface SessionView {
  id: string;
  settings: DialogueSettings;
  voices: Voice[];
  limits: DialogueLimits;
  generating: boolean;
  turns: TurnView[];
}

@Injectable()
export class SessionsService {
  private readonly logger = new Logger(SessionsService.name);
  private readonly limits: DialogueLimits;
  private readonly ttlMs: number;

  constructor(
    private readonly store: InMemoryStoreService,
    private readonly voiceCatalog: VoiceCatalogService,
    private readonly assembler: DialogueAssemblerService,
    private readonly configService: ConfigService,
  ) {
    this.limits = getDialogueLimits(this.configService);
    this.ttlMs = getSessionTtlMs(this.configService);
  }

  async createSession(input: SettingsInput = {}): Promise<DialogueSession> {
    this.evictIdleSessions();
    const settings: DialogueSettings = {
      languageCode: input.languageCode || (await this.voiceCatalog.defaultLanguage()),
      qualityTier: input.qualityTier ?? getDefaultQualityTier(this.configService),
      sampleRate: input.sampleRate ?? getDefaultSampleRate(this.configService),
    };
    const voices = await this.voiceCatalog.filter(settings.languageCode, settings.qualityTier);
    const session = DialogueSession.create(uuid(), settings, voices, { maxTurns: this.limits.maxTurns });
    this.store.saveSession(session);
    this.logger.log(`Created session ${session.id} (${settings.languageCode}, ${settings.qualityTier})`);
    return session;
  }

  getSession(sessionId: string): DialogueSession {
    this.evictIdleSessions();
    const session = this.store.getSession(sessionId);
    if (!session) {
      throw new NotFoundException('Session not found');
    }
    session.touch();
    return session;
  }

  async updateSettings(sessionId: string, input: SettingsInput): Promise<DialogueSession> {
    const session = this.getSession(sessionId);
    const settings: DialogueSettings = {
      languageCode: input.languageCode || session.settings.languageCode,
      qualityTier: input.qualityTier ?? session.settings.qualityTier,
      sampleRate: input.sampleRate ?? session.settings.sampleRate,
    };
    const voices = await this.voiceCatalog.filter(settings.languageCode, settings.qualityTier);
    session.applySettings(settings, voices);
    return session;
  }

  addTurn(sessionId: string): Turn {
    return this.getSession(sessionId).addTurn();
  }

  updateTurn(sessionId: string, turnId: string, updates: TurnUpdate): Turn {
    return this.getSession(sessionId).updateTurn(turnId, updates);
  }

  removeTurn(sessionId: string, turnId: string): void {
    this.getSession(sessionId).removeTurn(turnId);
  }

  deleteSession(sessionId: string): void {
    if (!this.store.deleteSession(sessionId)) {
      throw new NotFoundException('Session not found');
    }
  }

  async generate(sessionId: string, signal?: AbortSignal): Promise<AssemblyOutcome> {
    const session = this.getSession(sessionId);
    session.beginGeneration();
    try {
      return await this.assembler.assemble({
        turns: session.snapshot(),
        qualityTier: session.settings.qualityTier,
        sampleRate: session.settings.sampleRate,
        signal,
      });
    } finally {
      session.endGeneration();
    }
  }

  toView(session: DialogueSession): SessionView {
    return {
      id: session.id,
      settings: { ...session.settings },
      voices: [...session.availableVoices],
      limits: this.limits,
      generating: session.isGenerating,
      turns: session.listTurns().map((turn) => ({
        ...turn,
        charactersRemaining: this.limits.maxTurnChars - turn.rawText.trim().length,
      })),
    };
  }

  private evictIdleSessions() {
    const evicted = this.store.evictIdleSessions(Date.now() - this.ttlMs);
    if (evicted.length) {
      this.logger.log(`Evicted ${evicted.length} idle session(s)`);
    }
  }
}
