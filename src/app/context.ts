/**
 * AppContext: composition root.
 *
 * Wires config, logger, database, repositories and services. server.ts and
 * the maintenance scripts build one of these; route modules only read from it.
 */

import pino, { type Logger } from "pino";
import type { Database } from "better-sqlite3";

import { runtimeConfig, type RuntimeConfig } from "../config";
import { openDatabase } from "../db/connection";
import { runMigrations } from "../migrate";
import { ContributorRepository } from "../repositories/contributorRepository";
import { SessionRepository } from "../repositories/sessionRepository";
import { SightingRepository } from "../repositories/sightingRepository";
import { VehicleRepository } from "../repositories/vehicleRepository";
import { ConversationService } from "../services/conversation/conversationService";
import { DuplicateDetector } from "../services/duplicateDetector";
import { NominatimGeocoder, type Geocoder } from "../services/geocoder";
import { ExifMetadataExtractor, type ImageMetadataExtractor } from "../services/imageMetadata";
import { ImageStore, type ImageStorage } from "../services/imageStore";
import { HttpMediaDownloader, type MediaDownloader } from "../services/mediaDownloader";
import { WebhookNotifier, type Notifier } from "../services/notifier";
import { PlateMatcher } from "../services/plateMatcher";
import { SightingService } from "../services/sightingService";

// -----------------------------------------------------------------------------
// AppContext interface
// -----------------------------------------------------------------------------

export interface AppContext {
  config: RuntimeConfig;
  logger: Logger;
  db: Database;
  sessionRepo: SessionRepository;
  contributorRepo: ContributorRepository;
  sightingRepo: SightingRepository;
  vehicleRepo: VehicleRepository;
  plateMatcher: PlateMatcher;
  duplicateDetector: DuplicateDetector;
  sightingService: SightingService;
  conversationService: ConversationService;
  notifier: Notifier;
}

/** Collaborators that talk to the outside world; tests swap these for fakes. */
export interface ContextOverrides {
  config?: RuntimeConfig;
  logger?: Logger;
  db?: Database;
  mediaDownloader?: MediaDownloader;
  imageStore?: ImageStorage;
  metadataExtractor?: ImageMetadataExtractor;
  geocoder?: Geocoder;
  notifier?: Notifier;
}

export function createLogger(level: string = runtimeConfig.logLevel): Logger {
  return pino({
    level,
    base: { service: "fleet-sightings" },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function createContext(overrides: ContextOverrides = {}): AppContext {
  const config = overrides.config ?? runtimeConfig;
  const logger = overrides.logger ?? createLogger(config.logLevel);

  const db = overrides.db ?? openDatabase(config.sqlitePath);
  runMigrations(db, logger);

  const sessionRepo = new SessionRepository(db);
  const contributorRepo = new ContributorRepository(db);
  const sightingRepo = new SightingRepository(db);
  const vehicleRepo = new VehicleRepository(db);

  const plateMatcher = new PlateMatcher(vehicleRepo, logger);
  const duplicateDetector = new DuplicateDetector(sightingRepo, logger, config.nearDuplicateThreshold);
  const sightingService = new SightingService(sightingRepo, contributorRepo, duplicateDetector, logger);

  const notifier = overrides.notifier ?? new WebhookNotifier(config.notifyWebhookUrl, logger);

  const conversationService = new ConversationService(
    {
      sessions: sessionRepo,
      contributors: contributorRepo,
      plateMatcher,
      sightingService,
      mediaDownloader:
        overrides.mediaDownloader ??
        new HttpMediaDownloader(
          {
            accountSid: config.twilio.accountSid,
            authToken: config.twilio.authToken,
            timeoutMs: config.mediaDownloadTimeoutMs,
          },
          logger
        ),
      imageStore: overrides.imageStore ?? new ImageStore(config.imagesDir, logger),
      metadataExtractor: overrides.metadataExtractor ?? new ExifMetadataExtractor(logger),
      geocoder: overrides.geocoder ?? new NominatimGeocoder(config.geocoder, logger),
      notifier,
      logger,
    },
    {
      adminContributorId: config.adminContributorId,
      maxSuggestions: config.maxPlateSuggestions,
    }
  );

  logger.info(
    { sqlitePath: config.sqlitePath, registryVehicles: vehicleRepo.count() },
    "context.ready"
  );

  return {
    config,
    logger,
    db,
    sessionRepo,
    contributorRepo,
    sightingRepo,
    vehicleRepo,
    plateMatcher,
    duplicateDetector,
    sightingService,
    conversationService,
    notifier,
  };
}

export { runtimeConfig };
