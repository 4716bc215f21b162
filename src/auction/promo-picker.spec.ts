import { auctionSettings } from '../testing/settings.fixture';
import { PromoPicker } from './promo-picker';

const templates = ['{amount} and counting', '{leader} holds {amount}'];

describe('PromoPicker', () => {
  afterEach(() => jest.restoreAllMocks());

  it('cycles through templates round-robin', () => {
    const picker = new PromoPicker(
      auctionSettings({ promo: { enabled: true, policy: 'round-robin', templates } }),
    );
    expect(picker.pick(250_000, 'Credits')).toBe('250K Credits and counting');
    expect(picker.pick(2_500_000, 'Gold')).toBe('{leader} holds 2.5M Gold');
    expect(picker.pick(300_000, 'Credits')).toBe('300K Credits and counting');
  });

  it('picks at random by default', () => {
    jest.spyOn(Math, 'random').mockReturnValue(0.99);
    const picker = new PromoPicker(
      auctionSettings({ promo: { enabled: true, policy: 'random', templates } }),
    );
    expect(picker.pick(1_000, 'Credits')).toBe('{leader} holds 1K Credits');
  });

  it('returns null when disabled or without templates', () => {
    const disabled = new PromoPicker(
      auctionSettings({ promo: { enabled: false, policy: 'random', templates } }),
    );
    const empty = new PromoPicker(
      auctionSettings({ promo: { enabled: true, policy: 'random', templates: [] } }),
    );
    expect(disabled.enabled).toBe(false);
    expect(disabled.pick(1_000, 'Credits')).toBeNull();
    expect(empty.pick(1_000, 'Credits')).toBeNull();
  });
});
