import Database from "better-sqlite3";
import {
  type ChatSession,
  ConversationState,
  EMPTY_PENDING,
  type PendingSighting,
  SessionConflictError,
  isConversationState,
} from "../domain/session";

interface SessionRow {
  phone_number: string;
  state: string;
  pending_image_path: string | null;
  pending_plate: string | null;
  pending_latitude: number | null;
  pending_longitude: number | null;
  pending_timestamp: string | null;
  version: number;
  created_at: number;
  updated_at: number;
}

const now = () => Date.now();

export class SessionRepository {
  constructor(private readonly db: Database.Database) {}

  /**
   * Load the session for a phone number, creating an idle one on first contact.
   * `created` is true only for the invocation that inserted the row.
   */
  getOrCreate(phoneNumber: string): { session: ChatSession; created: boolean } {
    const run = this.db.transaction((phone: string) => {
      const timestamp = now();
      const info = this.db
        .prepare(
          `INSERT INTO chat_sessions (phone_number, state, version, created_at, updated_at)
           VALUES (@phone, @state, 0, @timestamp, @timestamp)
           ON CONFLICT(phone_number) DO NOTHING`
        )
        .run({ phone, state: ConversationState.IDLE, timestamp });

      const row = this.findRow(phone);
      if (!row) {
        throw new Error(`Session row missing after upsert for ${phone}`);
      }
      return { session: this.mapRow(row), created: info.changes > 0 };
    });

    return run.immediate(phoneNumber);
  }

  get(phoneNumber: string): ChatSession | undefined {
    const row = this.findRow(phoneNumber);
    return row ? this.mapRow(row) : undefined;
  }

  /**
   * Write state and the full pending set, conditional on the version read.
   * Throws SessionConflictError when another invocation wrote first.
   */
  save(
    phoneNumber: string,
    expectedVersion: number,
    state: ConversationState,
    pending: PendingSighting = EMPTY_PENDING
  ): ChatSession {
    const info = this.db
      .prepare(
        `UPDATE chat_sessions
         SET state = @state,
             pending_image_path = @image_path,
             pending_plate = @plate,
             pending_latitude = @latitude,
             pending_longitude = @longitude,
             pending_timestamp = @timestamp,
             version = version + 1,
             updated_at = @updated_at
         WHERE phone_number = @phone AND version = @expected_version`
      )
      .run({
        phone: phoneNumber,
        expected_version: expectedVersion,
        state,
        image_path: pending.imagePath,
        plate: pending.plate,
        latitude: pending.latitude,
        longitude: pending.longitude,
        timestamp: pending.timestamp,
        updated_at: now(),
      });

    if (info.changes === 0) {
      throw new SessionConflictError(phoneNumber, expectedVersion);
    }

    const row = this.findRow(phoneNumber);
    if (!row) {
      throw new Error(`Session row missing after save for ${phoneNumber}`);
    }
    return this.mapRow(row);
  }

  /**
   * Unconditional return to idle with every pending field cleared.
   * Used on CANCEL and by the error boundary.
   */
  reset(phoneNumber: string): void {
    this.db
      .prepare(
        `UPDATE chat_sessions
         SET state = @state,
             pending_image_path = NULL,
             pending_plate = NULL,
             pending_latitude = NULL,
             pending_longitude = NULL,
             pending_timestamp = NULL,
             version = version + 1,
             updated_at = @updated_at
         WHERE phone_number = @phone`
      )
      .run({ phone: phoneNumber, state: ConversationState.IDLE, updated_at: now() });
  }

  private findRow(phoneNumber: string): SessionRow | undefined {
    return this.db
      .prepare<{ phone: string }, SessionRow>(`SELECT * FROM chat_sessions WHERE phone_number = @phone`)
      .get({ phone: phoneNumber });
  }

  private mapRow(row: SessionRow): ChatSession {
    return {
      phoneNumber: row.phone_number,
      state: isConversationState(row.state) ? row.state : null,
      rawState: row.state,
      pending: {
        imagePath: row.pending_image_path,
        plate: row.pending_plate,
        latitude: row.pending_latitude,
        longitude: row.pending_longitude,
        timestamp: row.pending_timestamp,
      },
      version: row.version,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
    };
  }
}
