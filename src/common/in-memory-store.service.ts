import { Injectable } from '@nestjs/common';
import { DialogueSession } from '../sessions/dialogue-session';

@Injectable()
export class InMemoryStoreService {
  private readonly sessionsById: Map<string, DialogueSession> = new Map();

  getSession(sessionId: string): DialogueSession | undefined {
    return this.sessionsById.get(sessionId);
  }

  saveSession(session: DialogueSession): DialogueSession {
    this.sessionsById.set(session.id, session);
    return session;
  }

  deleteSession(sessionId: string): boolean {
    return this.sessionsById.delete(sessionId);
  }

  /** Drops sessions untouched since `cutoff` (epoch ms) unless they are mid-generation. */
  evictIdleSessions(cutoff: number): string[] {
    const evicted: string[] = [];
    for (const [id, session] of this.sessionsById) {
      if (!session.isGenerating && session.lastTouchedAt < cutoff) {
        this.sessionsById.delete(id);
        evicted.push(id);
      }
    }
    return evicted;
  }

  countSessions(): number {
    return this.sessionsById.size;
  }
}
