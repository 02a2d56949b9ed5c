import { afterEach, describe, expect, it, vi } from 'vitest';
import { FLAVOR_PHRASES, bannerForEvents, createBanner, pickPhrase, updateBanner } from './messages';

describe('messages', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('picks a phrase from the category', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0);
    expect(pickPhrase('hit')).toBe(FLAVOR_PHRASES.hit[0]);
  });

  it('stays in range at the top of Math.random', () => {
    vi.spyOn(Math, 'random').mockReturnValue(0.999);
    expect(pickPhrase('miss')).toBe(FLAVOR_PHRASES.miss[FLAVOR_PHRASES.miss.length - 1]);
  });

  it('holds the start banner longer than the others', () => {
    expect(createBanner('start').timeLeft).toBe(3);
    expect(createBanner('hit').timeLeft).toBe(2);
  });

  it('banners the strongest outcome of a tick', () => {
    expect(bannerForEvents([{ type: 'miss' }, { type: 'combo', count: 2 }])?.category).toBe('combo');
    expect(bannerForEvents([{ type: 'hit' }, { type: 'miss' }])?.category).toBe('hit');
    expect(bannerForEvents([{ type: 'miss' }])?.category).toBe('miss');
  });

  it('stays quiet when nothing landed', () => {
    expect(bannerForEvents([{ type: 'drop', position: { x: 0, y: 0 } }])).toBeNull();
    expect(bannerForEvents([])).toBeNull();
  });

  it('counts a banner down and clears it', () => {
    const banner = createBanner('upgrade');

    const later = updateBanner(banner, 1.5);
    expect(later?.timeLeft).toBe(0.5);
    expect(later?.text).toBe(banner.text);
    expect(banner.timeLeft).toBe(2);

    expect(updateBanner(banner, 2)).toBeNull();
    expect(updateBanner(null, 1)).toBeNull();
  });
});
