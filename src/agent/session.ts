/**
 * Session Manager
 *
 * In-memory conversation history per session, bounded to the last
 * `maxHistory` exchanges. Sessions live as long as the process.
 */

import type { Role } from '../providers/types.js';

export interface SessionMessage {
  role: Role;
  content: string;
}

export const DEFAULT_MAX_HISTORY = 2;

export class SessionManager {
  private readonly sessions = new Map<string, SessionMessage[]>();
  private counter = 0;

  /**
   * @param maxHistory - exchanges (user + assistant pairs) kept per session
   */
  constructor(private readonly maxHistory: number = DEFAULT_MAX_HISTORY) {}

  createSession(): string {
    this.counter += 1;
    const sessionId = `session_${this.counter}`;
    this.sessions.set(sessionId, []);
    return sessionId;
  }

  hasSession(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /** Creates the session when it doesn't exist yet */
  addMessage(sessionId: string, role: Role, content: string): void {
    const messages = this.sessions.get(sessionId) ?? [];
    messages.push({ role, content });

    const limit = this.maxHistory * 2;
    if (messages.length > limit) {
      messages.splice(0, messages.length - limit);
    }
    this.sessions.set(sessionId, messages);
  }

  addExchange(sessionId: string, question: string, answer: string): void {
    this.addMessage(sessionId, 'user', question);
    this.addMessage(sessionId, 'assistant', answer);
  }

  getMessages(sessionId: string): SessionMessage[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  /**
   * `User: …` / `Assistant: …` lines, or undefined for an unknown or empty session.
   */
  getConversationHistory(sessionId?: string): string | undefined {
    if (sessionId === undefined) return undefined;

    const messages = this.sessions.get(sessionId);
    if (!messages || messages.length === 0) return undefined;

    return messages.map((m) => `${m.role === 'user' ? 'User' : 'Assistant'}: ${m.content}`).join('\n');
  }

  /** Empties the history; the session id stays valid */
  clearSession(sessionId: string): void {
    if (this.sessions.has(sessionId)) {
      this.sessions.set(sessionId, []);
    }
  }
}
