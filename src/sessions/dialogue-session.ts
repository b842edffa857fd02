import { v4 as uuid } from 'uuid';
import {
  NoVoicesForFilterError,
  SessionBusyError,
  TurnLimitError,
  TurnNotFoundError,
  VoiceNotAvailableError,
} from '../domain/errors';
import { DialogueSettings, Turn, TurnInput, Voice } from '../domain/types';

export interface TurnUpdate {
  voiceId?: string;
  rawText?: string;
  pauseAfterMs?: number;
}

const OPENING_LINES = ['Hello!\nHow are you?', 'Great, thanks!\nReady for the meeting?'];

/**
 * One editing session: the global settings plus the ordered speaker turns.
 *
 * Every turn's voice is kept inside the voice list for the current language and quality;
 * when a filter change drops a voice, the turn falls back to the first voice still offered.
 */
export class DialogueSession {
  private readonly turns: Turn[] = [];
  private voices: Voice[];
  private generating = false;
  private touchedAt = Date.now();

  private constructor(
    readonly id: string,
    private currentSettings: DialogueSettings,
    voices: Voice[],
    private readonly maxTurns: number,
  ) {
    this.voices = voices;
  }

  static create(
    id: string,
    settings: DialogueSettings,
    voices: Voice[],
    options: { maxTurns: number },
  ): DialogueSession {
    if (!voices.length) {
      throw new NoVoicesForFilterError(settings.languageCode, settings.qualityTier);
    }
    const session = new DialogueSession(id, settings, [...voices], options.maxTurns);
    const openingTurns = Math.min(OPENING_LINES.length, options.maxTurns);
    for (let index = 0; index < openingTurns; index += 1) {
      const voice = voices[index] ?? voices[0];
      session.turns.push({ id: uuid(), voiceId: voice.id, rawText: OPENING_LINES[index], pauseAfterMs: 0 });
    }
    return session;
  }

  get settings(): Readonly<DialogueSettings> {
    return this.currentSettings;
  }

  get availableVoices(): readonly Voice[] {
    return this.voices;
  }

  get isGenerating(): boolean {
    return this.generating;
  }

  get lastTouchedAt(): number {
    return this.touchedAt;
  }

  listTurns(): readonly Readonly<Turn>[] {
    return this.turns;
  }

  /** Switches language, quality or sample rate. Rejected, with nothing changed, when no voice matches. */
  applySettings(settings: DialogueSettings, voices: Voice[]): void {
    this.assertIdle();
    if (!voices.length) {
      throw new NoVoicesForFilterError(settings.languageCode, settings.qualityTier);
    }
    this.currentSettings = { ...settings };
    this.voices = [...voices];
    const fallback = this.voices[0].id;
    for (const turn of this.turns) {
      if (!this.hasVoice(turn.voiceId)) {
        turn.voiceId = fallback;
      }
    }
    this.touch();
  }

  addTurn(): Turn {
    this.assertIdle();
    if (this.turns.length >= this.maxTurns) {
      throw new TurnLimitError(this.maxTurns);
    }
    const voice = this.voices[this.turns.length % this.voices.length];
    const turn: Turn = { id: uuid(), voiceId: voice.id, rawText: '', pauseAfterMs: 0 };
    this.turns.push(turn);
    this.touch();
    return { ...turn };
  }

  updateTurn(turnId: string, updates: TurnUpdate): Turn {
    this.assertIdle();
    const turn = this.findTurn(turnId);
    if (updates.voiceId !== undefined && !this.hasVoice(updates.voiceId)) {
      throw new VoiceNotAvailableError(updates.voiceId);
    }
    turn.voiceId = updates.voiceId ?? turn.voiceId;
    turn.rawText = updates.rawText ?? turn.rawText;
    turn.pauseAfterMs = updates.pauseAfterMs ?? turn.pauseAfterMs;
    this.touch();
    return { ...turn };
  }

  removeTurn(turnId: string): void {
    this.assertIdle();
    const index = this.turns.findIndex((turn) => turn.id === turnId);
    if (index === -1) {
      throw new TurnNotFoundError(turnId);
    }
    this.turns.splice(index, 1);
    this.touch();
  }

  /** Copies the turns for one generate run; later edits do not reach a run in progress. */
  snapshot(): TurnInput[] {
    return this.turns.map(({ voiceId, rawText, pauseAfterMs }) => ({ voiceId, rawText, pauseAfterMs }));
  }

  beginGeneration(): void {
    this.assertIdle();
    this.generating = true;
    this.touch();
  }

  endGeneration(): void {
    this.generating = false;
    this.touch();
  }

  touch(): void {
    this.touchedAt = Date.now();
  }

  private hasVoice(voiceId: string): boolean {
    return this.voices.some((voice) => voice.id === voiceId);
  }

  private findTurn(turnId: string): Turn {
    const turn = this.turns.find((t) => t.id === turnId);
    if (!turn) {
      throw new TurnNotFoundError(turnId);
    }
    return turn;
  }

  private assertIdle(): void {
    if (this.generating) {
      throw new SessionBusyError(this.id);
    }
  }
}
