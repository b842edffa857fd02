export class DialogueError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class CatalogUnavailableError extends DialogueError {
  constructor(cause: unknown) {
    super(`Could not reach Polly: ${describeCause(cause)}`, { cause });
  }
}

export class SynthesisError extends DialogueError {
  readonly voiceId: string;
  readonly transient: boolean;

  constructor(voiceId: string, cause: unknown, options?: { transient?: boolean }) {
    super(`Polly error with voice "${voiceId}": ${describeCause(cause)}`, { cause });
    this.voiceId = voiceId;
    this.transient = options?.transient ?? false;
  }
}

export class AssemblyCancelledError extends DialogueError {
  constructor() {
    super('Dialogue generation was cancelled');
  }
}

export class TurnLimitError extends DialogueError {
  constructor(readonly limit: number) {
    super(`A dialogue can have at most ${limit} speakers`);
  }
}

export class NoVoicesForFilterError extends DialogueError {
  constructor(
    readonly languageCode: string,
    readonly qualityTier: string,
  ) {
    super(`No voices available for ${languageCode} + ${qualityTier}. Try changing options.`);
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message || cause.name;
  }
  return String(cause);
}

export class TurnNotFoundError extends DialogueError {
  constructor(readonly turnId: string) {
    super(`Speaker ${turnId} not found`);
  }
}

export class VoiceNotAvailableError extends DialogueError {
  constructor(readonly voiceId: string) {
    super(`Voice ${voiceId} is not available for the selected language and quality`);
  }
}

export class SessionBusyError extends DialogueError {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} is generating audio; try again when it finishes`);
  }
}
