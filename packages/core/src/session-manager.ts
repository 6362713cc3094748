/**
 * Conversation management over an agent: many sessions, addressed by id
 */

import { randomUUID } from "node:crypto";
import type { Agent, AgentResult, AgentSession, AgentStatus } from "./types/index.js";

/**
 * Why a prompt turn ended, as reported to the caller
 */
export type StopReason = "end_turn" | "max_turn_requests" | "cancelled" | "refusal";

export type PromptResult = {
  stopReason: StopReason;
  /** Agent result; absent when the request was refused */
  result?: AgentResult;
  /** Reason for a refusal */
  message?: string;
};

export type SessionInfo = {
  id: string;
  createdAt: number;
  cancelled: boolean;
  steps: number;
};

export type SessionManager = {
  newSession: () => string;
  prompt: (sessionId: string, text: string) => Promise<PromptResult>;
  /** Cancel the in-flight turn of a session; honoured between steps */
  cancel: (sessionId: string) => boolean;
  close: (sessionId: string) => boolean;
  getSession: (sessionId: string) => SessionInfo | undefined;
  listSessions: () => SessionInfo[];
};

type SessionEntry = {
  session: AgentSession;
  createdAt: number;
  cancelled: boolean;
  controller?: AbortController;
  busy: boolean;
};

const STOP_REASONS: Record<AgentStatus, StopReason> = {
  completed: "end_turn",
  max_steps: "max_turn_requests",
  cancelled: "cancelled",
  error: "refusal",
};

export function createSessionManager(agent: Agent): SessionManager {
  const sessions = new Map<string, SessionEntry>();

  const info = (id: string, entry: SessionEntry): SessionInfo => ({
    id,
    createdAt: entry.createdAt,
    cancelled: entry.cancelled,
    steps: entry.session.steps,
  });

  return {
    newSession() {
      const id = randomUUID();
      sessions.set(id, {
        session: agent.createSession(),
        createdAt: Date.now(),
        cancelled: false,
        busy: false,
      });
      return id;
    },

    async prompt(sessionId, text) {
      const entry = sessions.get(sessionId);
      if (!entry) {
        return { stopReason: "refusal", message: `Unknown session: ${sessionId}` };
      }
      if (entry.busy) {
        return { stopReason: "refusal", message: `Session ${sessionId} is already running` };
      }

      const controller = new AbortController();
      entry.controller = controller;
      entry.cancelled = false;
      entry.busy = true;

      try {
        entry.session.addUserMessage(text);
        const result = await entry.session.run({ signal: controller.signal });
        return {
          stopReason: STOP_REASONS[result.status],
          result,
          ...(result.error && { message: result.error.message }),
        };
      } finally {
        entry.busy = false;
        entry.controller = undefined;
      }
    },

    cancel(sessionId) {
      const entry = sessions.get(sessionId);
      if (!entry) {
        return false;
      }
      entry.cancelled = true;
      entry.controller?.abort();
      return true;
    },

    close(sessionId) {
      const entry = sessions.get(sessionId);
      entry?.controller?.abort();
      return sessions.delete(sessionId);
    },

    getSession(sessionId) {
      const entry = sessions.get(sessionId);
      return entry ? info(sessionId, entry) : undefined;
    },

    listSessions() {
      return Array.from(sessions, ([id, entry]) => info(id, entry));
    },
  };
}
