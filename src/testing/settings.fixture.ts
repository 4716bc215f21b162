import configuration, { type AuctionSettings } from '../config/configuration';

/** Default auction settings with test overrides. */
export function auctionSettings(overrides: Partial<AuctionSettings> = {}): AuctionSettings {
  return { ...configuration().auction, ...overrides };
}
