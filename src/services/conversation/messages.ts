/**
 * Outbound SMS reply texts.
 */

import type { SightingStats } from "../sightingService";

export const ordinal = (n: number): string => {
  const mod100 = n % 100;
  if (mod100 >= 11 && mod100 <= 13) return `${n}th`;
  switch (n % 10) {
    case 1:
      return `${n}st`;
    case 2:
      return `${n}nd`;
    case 3:
      return `${n}rd`;
    default:
      return `${n}th`;
  }
};

const LOCATION_EXAMPLES = "(e.g., 'Astoria' or '123 Main St, Brooklyn')";

export const messages = {
  help: () =>
    [
      "NYC For-Hire Vehicle Sightings",
      "",
      "Send a photo of a for-hire vehicle to log a sighting. I'll read the time and location from the photo and ask you for the license plate.",
      "",
      "Commands:",
      "- Send a photo to start",
      "- Reply CANCEL to abort",
      "- Reply HELP for this message",
    ].join("\n"),

  welcomeWithImage: (name: string | null) =>
    name ? `Great photo, ${name}! What's the license plate number?` : "Great photo! What's the license plate number?",

  requestPlate: () => "Please send the license plate number.",

  requestLocation: () => "Where did you see this vehicle? (Send a street address or neighborhood in NYC)",

  requestLocationAfterPlate: (plate: string) =>
    `Found ${plate} in the registry. Where did you see this vehicle? (Send a street address or neighborhood in NYC)`,

  locationSavedRequestPlate: () => "Got the location. What's the license plate number?",

  locationNotFound: () =>
    `Sorry, I couldn't find that location. Please try a street address or neighborhood in NYC ${LOCATION_EXAMPLES}`,

  plateNotFound: (plate: string, suggestions: string[]) => {
    let msg = `Plate ${plate} not found in the NYC TLC database.`;
    if (suggestions.length === 0) {
      return `${msg} Please double-check and send the correct plate number.`;
    }
    msg += "\n\nDid you mean one of these?\n";
    suggestions.slice(0, 5).forEach((suggestion, i) => {
      msg += `${i + 1}. ${suggestion}\n`;
    });
    msg += "\nSend the correct plate to continue.";
    return msg;
  },

  sightingConfirmed: (plate: string, stats: SightingStats) =>
    `Sighting saved! That's the ${ordinal(stats.plateCount)} sighting of ${plate}, ` +
    `the ${ordinal(stats.totalCount)} sighting overall, and your ${ordinal(stats.contributorCount)} contribution. Thanks!`,

  namePrompt: () =>
    "\n\nWould you like to set a name for future posts? Reply with your name, or SKIP to remain anonymous.",

  duplicatePhoto: () => "You've already submitted this exact photo. Send a new photo to log another sighting!",

  nameSkipped: () => "No problem, you'll remain anonymous. Send a new photo anytime!",

  nameTooLong: (max: number) => `Name is too long (max ${max} characters). Please try again or reply SKIP.`,

  nameSaved: (name: string) => `Great! Future posts will credit you as '${name}'. Send a new photo anytime!`,

  cancelled: () => "Sighting cancelled. Send a new photo anytime!",

  busy: () => "Still working on your last message. Please try again in a moment.",

  errorGeneral: () => "Sorry, something went wrong. Please try again or contact support.",
};
