export interface Sighting {
  id: number;
  licensePlate: string | null;
  /** ISO-8601 capture time */
  timestamp: string;
  latitude: number | null;
  longitude: number | null;
  imagePath: string;
  createdAt: number;
  contributorId: number;
  postUri: string | null;
  imageHashSha256: string | null;
  imageHashPerceptual: string | null;
}

export interface NewSighting {
  /** null records an unreadable plate; such sightings are never published */
  licensePlate: string | null;
  timestamp: string;
  latitude: number | null;
  longitude: number | null;
  imagePath: string;
  contributorId: number;
  imageHashSha256: string | null;
  imageHashPerceptual: string | null;
}

export type InsertSightingResult =
  | { status: "inserted"; sighting: Sighting }
  | { status: "duplicate" };

/** Row shape handed to the publishing side. */
export interface UnpostedSighting extends Sighting {
  contributorPreferredName: string | null;
  contributorBlueskyHandle: string | null;
}

export interface SimilarImage {
  id: number;
  imagePath: string;
  distance: number;
}
