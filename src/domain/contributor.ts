export interface Contributor {
  id: number;
  phoneNumber: string | null;
  blueskyHandle: string | null;
  preferredName: string | null;
  createdAt: number;
}

export const MAX_PREFERRED_NAME_LENGTH = 50;

/** preferred_name, then bluesky handle; null means anonymous. */
export const displayName = (contributor: Pick<Contributor, "preferredName" | "blueskyHandle">): string | null =>
  contributor.preferredName || contributor.blueskyHandle || null;
