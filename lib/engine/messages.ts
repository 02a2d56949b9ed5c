import type { GameEvent } from '@/types/game';

export type MessageCategory = 'start' | 'hit' | 'miss' | 'combo' | 'upgrade';

export const FLAVOR_PHRASES: Record<MessageCategory, string[]> = {
  start: [
    'Welcome to the drop zone, pilot.',
    'Fuses are short and targets are moving. Lead them.',
    'Every bomb has an address. Make sure it is the right one.',
  ],
  hit: [
    'Direct hit!',
    'Target neutralized. Next.',
    'Right on the mark.',
    'Another one off the board.',
    'Clean drop.',
  ],
  miss: [
    'Close... drop a little earlier.',
    'Dirt and smoke. Nothing else.',
    'They moved. Lead the target.',
  ],
  combo: [
    'Combo! They never saw it coming.',
    'Multi-kill! One bomb, many problems solved.',
    'Cluster cleared!',
  ],
  upgrade: [
    'Upgrade installed.',
    'Systems improved. Back to work.',
    'Fresh parts, same mission.',
  ],
};

const BANNER_DURATION: Record<MessageCategory, number> = {
  start: 3,
  hit: 2,
  miss: 2,
  combo: 2,
  upgrade: 2,
};

export interface MessageBanner {
  category: MessageCategory;
  text: string;
  timeLeft: number; // seconds
}

export function pickPhrase(category: MessageCategory): string {
  const phrases = FLAVOR_PHRASES[category];
  return phrases[Math.floor(Math.random() * phrases.length) % phrases.length];
}

export function createBanner(category: MessageCategory): MessageBanner {
  return {
    category,
    text: pickPhrase(category),
    timeLeft: BANNER_DURATION[category],
  };
}

/**
 * Banner for the tick's aggregate outcome, or null when nothing landed.
 */
export function bannerForEvents(events: GameEvent[]): MessageBanner | null {
  let category: MessageCategory | null = null;
  for (const event of events) {
    if (event.type === 'combo') {
      category = 'combo';
    } else if (event.type === 'hit' && category !== 'combo') {
      category = 'hit';
    } else if (event.type === 'miss' && category === null) {
      category = 'miss';
    }
  }
  return category ? createBanner(category) : null;
}

export function updateBanner(banner: MessageBanner | null, dt: number): MessageBanner | null {
  if (!banner) return null;
  const timeLeft = banner.timeLeft - dt;
  if (timeLeft <= 0) return null;
  return { ...banner, timeLeft };
}
