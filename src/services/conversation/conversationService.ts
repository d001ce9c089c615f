/**
 * ConversationService: the per-phone-number SMS sighting flow.
 *
 *   IDLE --photo--> AWAITING_PLATE --plate, GPS known--> commit
 *                                  --plate, no GPS----> AWAITING_LOCATION --location--> commit
 *   commit --contributor unnamed--> AWAITING_NAME --name|SKIP--> IDLE
 *
 * Each inbound message is one invocation: the session is loaded from the
 * store, one transition runs, and the new state is written back with a
 * version check before the reply is returned. HELP and CANCEL are honoured
 * in every state.
 */

import type { Logger } from "pino";
import { MAX_PREFERRED_NAME_LENGTH, displayName } from "../../domain/contributor";
import {
  type ChatSession,
  ConversationState,
  EMPTY_PENDING,
  type PendingSighting,
  SessionConflictError,
} from "../../domain/session";
import type { ContributorRepository } from "../../repositories/contributorRepository";
import type { SessionRepository } from "../../repositories/sessionRepository";
import type { Geocoder } from "../geocoder";
import type { ImageMetadata, ImageMetadataExtractor } from "../imageMetadata";
import type { ImageStorage, StoredImage } from "../imageStore";
import type { MediaDownloader } from "../mediaDownloader";
import type { Notifier } from "../notifier";
import { type PlateMatcher, normalizePlate } from "../plateMatcher";
import type { SightingService } from "../sightingService";
import { messages } from "./messages";

export interface InboundMedia {
  url: string;
  contentType?: string;
}

export interface InboundMessage {
  from: string;
  body: string;
  media: InboundMedia[];
}

export interface ConversationReply {
  text: string;
  /** state after this message; null when the stored state is unrecognized */
  state: ConversationState | null;
}

export interface ConversationDeps {
  sessions: SessionRepository;
  contributors: ContributorRepository;
  plateMatcher: PlateMatcher;
  sightingService: SightingService;
  mediaDownloader: MediaDownloader;
  imageStore: ImageStorage;
  metadataExtractor: ImageMetadataExtractor;
  geocoder: Geocoder;
  notifier: Notifier;
  logger: Logger;
}

export interface ConversationOptions {
  adminContributorId: number;
  maxSuggestions: number;
}

const DEFAULT_OPTIONS: ConversationOptions = {
  adminContributorId: 1,
  maxSuggestions: 5,
};

const reply = (text: string, state: ConversationState | null): ConversationReply => ({ text, state });

export class ConversationService {
  private readonly logger: Logger;
  private readonly options: ConversationOptions;

  constructor(
    private readonly deps: ConversationDeps,
    options: Partial<ConversationOptions> = {}
  ) {
    this.logger = deps.logger.child({ module: "conversation" });
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async handleMessage(message: InboundMessage): Promise<ConversationReply> {
    const from = message.from;
    const body = message.body.trim();

    let session: ChatSession;
    try {
      const loaded = this.deps.sessions.getOrCreate(from);
      session = loaded.session;
      if (loaded.created) {
        this.notifyFirstContact(from);
      }
    } catch (err) {
      this.logger.error({ err, from }, "conversation.session_load_failed");
      return reply(messages.errorGeneral(), ConversationState.IDLE);
    }

    this.logger.info(
      { from, state: session.rawState, hasMedia: message.media.length > 0 },
      "conversation.inbound"
    );

    try {
      const command = body.toUpperCase();
      if (command === "HELP") {
        return reply(messages.help(), session.state);
      }
      if (command === "CANCEL") {
        this.deps.sessions.reset(from);
        return reply(messages.cancelled(), ConversationState.IDLE);
      }

      switch (session.state) {
        case ConversationState.IDLE:
          return await this.handleIdle(session, message);
        case ConversationState.AWAITING_PLATE:
          return await this.handlePlate(session, body);
        case ConversationState.AWAITING_LOCATION:
          return await this.handleLocation(session, body);
        case ConversationState.AWAITING_NAME:
          return this.handleName(session, body);
        case null:
          this.logger.warn({ from, state: session.rawState }, "conversation.unknown_state");
          this.deps.sessions.reset(from);
          return reply(messages.help(), ConversationState.IDLE);
      }
    } catch (err) {
      if (err instanceof SessionConflictError) {
        this.logger.warn({ from, expectedVersion: err.expectedVersion }, "conversation.session_conflict");
        return reply(messages.busy(), session.state);
      }

      this.logger.error({ err, from, state: session.rawState }, "conversation.transition_failed");
      this.safeReset(from);
      return reply(messages.errorGeneral(), ConversationState.IDLE);
    }
  }

  private async handleIdle(session: ChatSession, message: InboundMessage): Promise<ConversationReply> {
    const media = message.media[0];
    if (!media) {
      return reply(messages.help(), ConversationState.IDLE);
    }

    const bytes = await this.deps.mediaDownloader.download(media.url);
    if (!bytes) {
      return reply(messages.errorGeneral(), ConversationState.IDLE);
    }

    const stored = await this.deps.imageStore.save(bytes);

    let metadata: ImageMetadata;
    try {
      metadata = await this.deps.metadataExtractor.extract(stored.path);
    } catch (err) {
      await this.discardImage(stored);
      throw err;
    }

    this.deps.sessions.save(session.phoneNumber, session.version, ConversationState.AWAITING_PLATE, {
      imagePath: stored.path,
      plate: null,
      latitude: metadata.latitude,
      longitude: metadata.longitude,
      timestamp: metadata.timestamp,
    });

    this.logger.info(
      {
        from: session.phoneNumber,
        imagePath: stored.path,
        contentType: media.contentType,
        hasGps: metadata.latitude !== null,
      },
      "conversation.image_received"
    );

    const contributor = this.deps.contributors.findByPhone(session.phoneNumber);
    const name = contributor ? displayName(contributor) : null;
    return reply(messages.welcomeWithImage(name), ConversationState.AWAITING_PLATE);
  }

  private async handlePlate(session: ChatSession, body: string): Promise<ConversationReply> {
    if (!body) {
      return reply(messages.requestPlate(), ConversationState.AWAITING_PLATE);
    }
    if (!this.hasPendingImage(session.pending)) {
      return this.resetWithHelp(session, "plate");
    }

    const plate = normalizePlate(body);
    const validation = this.deps.plateMatcher.validate(plate);

    if (!validation.valid) {
      const suggestions = this.deps.plateMatcher.suggest(plate, this.options.maxSuggestions);
      this.logger.info({ from: session.phoneNumber, plate, suggestions: suggestions.length }, "conversation.plate_not_found");
      return reply(messages.plateNotFound(plate, suggestions), ConversationState.AWAITING_PLATE);
    }

    const { latitude, longitude } = session.pending;
    if (latitude === null || longitude === null) {
      this.deps.sessions.save(session.phoneNumber, session.version, ConversationState.AWAITING_LOCATION, {
        ...session.pending,
        plate,
        latitude: null,
        longitude: null,
      });
      return reply(messages.requestLocationAfterPlate(plate), ConversationState.AWAITING_LOCATION);
    }

    return this.commit(session, plate, latitude, longitude);
  }

  private async handleLocation(session: ChatSession, body: string): Promise<ConversationReply> {
    if (!body) {
      return reply(messages.requestLocation(), ConversationState.AWAITING_LOCATION);
    }
    if (!this.hasPendingImage(session.pending)) {
      return this.resetWithHelp(session, "location");
    }

    const coords = await this.deps.geocoder.geocode(body);
    if (!coords) {
      return reply(messages.locationNotFound(), ConversationState.AWAITING_LOCATION);
    }

    if (session.pending.plate) {
      return this.commit(session, session.pending.plate, coords.latitude, coords.longitude);
    }

    this.deps.sessions.save(session.phoneNumber, session.version, ConversationState.AWAITING_PLATE, {
      ...session.pending,
      plate: null,
      latitude: coords.latitude,
      longitude: coords.longitude,
    });
    return reply(messages.locationSavedRequestPlate(), ConversationState.AWAITING_PLATE);
  }

  private handleName(session: ChatSession, body: string): ConversationReply {
    if (!body || body.toUpperCase() === "SKIP") {
      this.deps.sessions.save(session.phoneNumber, session.version, ConversationState.IDLE, EMPTY_PENDING);
      return reply(messages.nameSkipped(), ConversationState.IDLE);
    }

    if (body.length > MAX_PREFERRED_NAME_LENGTH) {
      return reply(messages.nameTooLong(MAX_PREFERRED_NAME_LENGTH), ConversationState.AWAITING_NAME);
    }

    const contributor = this.deps.contributors.getOrCreateByPhone(session.phoneNumber);
    this.deps.contributors.updatePreferredName(contributor.id, body);
    this.deps.sessions.save(session.phoneNumber, session.version, ConversationState.IDLE, EMPTY_PENDING);

    this.logger.info({ contributorId: contributor.id }, "conversation.name_set");
    return reply(messages.nameSaved(body), ConversationState.IDLE);
  }

  private async commit(
    session: ChatSession,
    plate: string,
    latitude: number,
    longitude: number
  ): Promise<ConversationReply> {
    const { imagePath, timestamp } = session.pending;
    if (!imagePath) {
      return this.resetWithHelp(session, "commit");
    }

    const result = await this.deps.sightingService.commit({
      phoneNumber: session.phoneNumber,
      plate,
      imagePath,
      timestamp: timestamp ?? new Date().toISOString(),
      latitude,
      longitude,
    });

    if (result.status === "duplicate") {
      this.deps.sessions.save(session.phoneNumber, session.version, ConversationState.IDLE, EMPTY_PENDING);
      return reply(messages.duplicatePhoto(), ConversationState.IDLE);
    }

    const { contributor, stats, sighting } = result;
    if (contributor.id !== this.options.adminContributorId) {
      this.deps.notifier.notify(`Successful submission from ${contributor.preferredName || session.phoneNumber}`);
    }

    const confirmation = messages.sightingConfirmed(plate, stats);
    const next = contributor.preferredName ? ConversationState.IDLE : ConversationState.AWAITING_NAME;
    try {
      this.deps.sessions.save(session.phoneNumber, session.version, next, EMPTY_PENDING);
    } catch (err) {
      if (!(err instanceof SessionConflictError)) throw err;
      // The sighting is stored; confirm it and leave the newer session state alone.
      this.logger.warn({ from: session.phoneNumber, sightingId: sighting.id }, "conversation.conflict_after_commit");
      return reply(confirmation, this.deps.sessions.get(session.phoneNumber)?.state ?? null);
    }

    if (next === ConversationState.AWAITING_NAME) {
      return reply(confirmation + messages.namePrompt(), ConversationState.AWAITING_NAME);
    }
    return reply(confirmation, ConversationState.IDLE);
  }

  private notifyFirstContact(from: string): void {
    const contributor = this.deps.contributors.findByPhone(from);
    if (contributor?.id === this.options.adminContributorId) return;
    this.deps.notifier.notify(`New chat session from ${contributor?.preferredName || from}`);
  }

  private hasPendingImage(pending: PendingSighting): boolean {
    return pending.imagePath !== null;
  }

  private resetWithHelp(session: ChatSession, step: string): ConversationReply {
    this.logger.warn({ from: session.phoneNumber, step }, "conversation.missing_pending_image");
    this.deps.sessions.reset(session.phoneNumber);
    return reply(messages.help(), ConversationState.IDLE);
  }

  private async discardImage(stored: StoredImage): Promise<void> {
    // An image that was already on disk may belong to an earlier sighting.
    if (!stored.created) return;
    try {
      await this.deps.imageStore.remove(stored.path);
    } catch (err) {
      this.logger.warn({ err, path: stored.path }, "conversation.image_cleanup_failed");
    }
  }

  private safeReset(from: string): void {
    try {
      this.deps.sessions.reset(from);
    } catch (err) {
      this.logger.error({ err, from }, "conversation.reset_failed");
    }
  }
}
