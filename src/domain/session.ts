/**
 * Conversation session types.
 *
 * One session per phone number. The pending_* fields hold the partially
 * assembled sighting between messages.
 */

export const ConversationState = {
  IDLE: "idle",
  AWAITING_PLATE: "awaiting_plate",
  AWAITING_LOCATION: "awaiting_location",
  AWAITING_NAME: "awaiting_name",
} as const;

export type ConversationState = (typeof ConversationState)[keyof typeof ConversationState];

const STATES: ReadonlySet<string> = new Set(Object.values(ConversationState));

export const isConversationState = (value: unknown): value is ConversationState =>
  typeof value === "string" && STATES.has(value);

export interface PendingSighting {
  imagePath: string | null;
  plate: string | null;
  latitude: number | null;
  longitude: number | null;
  /** ISO-8601 capture time */
  timestamp: string | null;
}

export interface ChatSession {
  phoneNumber: string;
  /** null when the stored value is not a known state */
  state: ConversationState | null;
  rawState: string;
  pending: PendingSighting;
  version: number;
  createdAt: number;
  updatedAt: number;
}

export const EMPTY_PENDING: PendingSighting = Object.freeze({
  imagePath: null,
  plate: null,
  latitude: null,
  longitude: null,
  timestamp: null,
});

export class SessionConflictError extends Error {
  constructor(
    public readonly phoneNumber: string,
    public readonly expectedVersion: number
  ) {
    super(`Session for ${phoneNumber} changed concurrently (expected version ${expectedVersion})`);
    this.name = "SessionConflictError";
  }
}
