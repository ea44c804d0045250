// services/sessionService.ts
import { v4 as uuidv4 } from "uuid";
import { findMappingByLine } from "../classes/MappingEngine";
import { SessionNotFoundError } from "../errors/converter/ConverterErrorTypes";
import { MappingRecord, MappingSession } from "../types/conversionTypes";

export class SessionService {
  private sessions = new Map<string, MappingSession>();

  constructor(private readonly maxSessions: number) {}

  createSession(mappings: MappingRecord[], markdownLineCount: number): MappingSession {
    const session: MappingSession = {
      sessionId: uuidv4(),
      createdAt: new Date().toISOString(),
      mappings,
      markdownLineCount,
    };

    // Map iteration order is insertion order, so the first key is the oldest
    while (this.sessions.size >= this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (oldest.done) break;
      console.log(`SessionService: Evicting mapping session ${oldest.value}`);
      this.sessions.delete(oldest.value);
    }

    this.sessions.set(session.sessionId, session);
    return session;
  }

  getSession(sessionId: string): MappingSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  findHtmlByLine(sessionId: string, lineNumber: number): MappingRecord | undefined {
    return findMappingByLine(this.getSession(sessionId).mappings, lineNumber);
  }

  deleteSession(sessionId: string): void {
    if (!this.sessions.delete(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }
  }

  get size(): number {
    return this.sessions.size;
  }

  get capacity(): number {
    return this.maxSessions;
  }

  clear(): void {
    this.sessions.clear();
  }
}
