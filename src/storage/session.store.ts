import { AnswerResult } from "../shared/types/evaluation.types";

/**
 * Per-session answer history. Appends keep arrival order; sessions never see
 * each other's answers.
 */
export interface SessionStore {
  append(sessionId: string, result: AnswerResult): void;
  get(sessionId: string): ReadonlyArray<AnswerResult>;
  reset(sessionId: string): void;
}

export class InMemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, AnswerResult[]>();

  append(sessionId: string, result: AnswerResult): void {
    const existing = this.sessions.get(sessionId);
    if (existing) {
      existing.push(result);
      return;
    }
    this.sessions.set(sessionId, [result]);
  }

  get(sessionId: string): ReadonlyArray<AnswerResult> {
    const answers = this.sessions.get(sessionId);
    return answers ? [...answers] : [];
  }

  reset(sessionId: string): void {
    this.sessions.delete(sessionId);
  }
}
