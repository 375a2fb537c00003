import { LocationSample } from "../types/contracts.js";

export const DEFAULT_MAX_ACCURACY_METERS = 25;

// Accuracy is a radius: bigger is worse. Exactly on the threshold passes.
export function isAccurateEnough(sample: LocationSample, maxAccuracyMeters = DEFAULT_MAX_ACCURACY_METERS): boolean {
  return sample.accuracyMeters <= maxAccuracyMeters;
}

export function mapLinkFor(latitude: number, longitude: number): string {
  return `https://www.google.com/maps?q=${latitude},${longitude}`;
}
