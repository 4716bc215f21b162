export { AuctionEngine, validateOpenParams } from './auction-engine';
export {
  parseAmount,
  validateAmount,
  minimumNextBid,
  calculateCommission,
  fmtAmount,
  compareAmounts,
} from './bid-amount';
export type {
  Auction,
  AuctionStatus,
  AuctionSnapshot,
  AuctionOutcome,
  Bid,
  BidLimits,
  DurationLimits,
  OpenAuctionInput,
  PanelReference,
  PlaceBidResult,
  UndoBidResult,
  EnterCountdownResult,
  EndAuctionResult,
} from './types';
