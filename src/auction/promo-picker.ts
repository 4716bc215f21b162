import { Inject, Injectable } from '@nestjs/common';
import { AUCTION_SETTINGS } from '../config/config.module';
import type { AuctionSettings } from '../config/configuration';
import { fmtAmount } from './engine';

/**
 * Picks the promotional line posted when an auction goes quiet.
 * `{amount}` is filled here; `{leader}` stays for the chat adapter.
 */
@Injectable()
export class PromoPicker {
  private cursor = 0;

  constructor(
    @Inject(AUCTION_SETTINGS) private readonly settings: AuctionSettings,
  ) {}

  get enabled(): boolean {
    return this.settings.promo.enabled && this.settings.promo.templates.length > 0;
  }

  pick(amount: number, currency: string): string | null {
    const { templates, policy } = this.settings.promo;
    if (!this.enabled) return null;
    let index: number;
    if (policy === 'round-robin') {
      index = this.cursor % templates.length;
      this.cursor += 1;
    } else {
      index = Math.floor(Math.random() * templates.length);
    }
    const template = templates[index] ?? templates[0] ?? '';
    return template.replace(/\{amount\}/g, `${fmtAmount(amount)} ${currency}`);
  }
}
