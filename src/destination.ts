const STEAM_PROFILE_PATTERN = /^https?:\/\/(www\.)?steamcommunity\.com\/(id|profiles)\/[A-Za-z0-9_./-]+$/i;

export function isValidDestination(text: string | null | undefined): boolean {
  return STEAM_PROFILE_PATTERN.test((text ?? "").trim());
}

export function formatUnits(units: number): string {
  return String(units).replace(/\B(?=(\d{3})+(?!\d))/g, " ");
}
