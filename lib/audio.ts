// Web Audio API synthesizer for the game's sound effects
// No audio files needed - all sounds are generated

import type { GameEvent } from '@/types/game';

let audioContext: AudioContext | null = null;
let masterGain: GainNode | null = null;
let muted = false;
let prefsLoaded = false;

const MASTER_VOLUME = 0.3;
const MUTE_STORAGE_KEY = 'drop-zone-muted';

function loadMutePreference() {
  if (prefsLoaded || typeof window === 'undefined') return;
  prefsLoaded = true;
  try {
    muted = window.localStorage.getItem(MUTE_STORAGE_KEY) === 'true';
  } catch {
    // Ignore storage errors and keep in-memory default
  }
}

function persistMutePreference() {
  if (typeof window === 'undefined') return;
  try {
    window.localStorage.setItem(MUTE_STORAGE_KEY, String(muted));
  } catch {
    // Ignore storage errors
  }
}

function getAudioContext(): AudioContext | null {
  if (typeof window === 'undefined') return null;
  loadMutePreference();

  if (!audioContext) {
    try {
      audioContext = new window.AudioContext();
      masterGain = audioContext.createGain();
      masterGain.gain.value = muted ? 0 : MASTER_VOLUME;
      masterGain.connect(audioContext.destination);
    } catch (e) {
      console.warn('Web Audio not supported', e);
      return null;
    }
  }

  // Resume if suspended (browser autoplay policy)
  if (audioContext.state === 'suspended') {
    audioContext.resume().catch((e: unknown) => {
      console.warn('Audio resume blocked', e);
    });
  }

  return audioContext;
}

export function setMuted(value: boolean) {
  loadMutePreference();
  muted = value;
  persistMutePreference();
  if (masterGain) {
    masterGain.gain.setTargetAtTime(value ? 0 : MASTER_VOLUME, audioContext?.currentTime || 0, 0.01);
  }
}

export function isMuted(): boolean {
  loadMutePreference();
  return muted;
}

function playNoiseBurst(ctx: AudioContext, master: GainNode, duration: number, gainAmount: number, cutoff: number) {
  const sampleCount = Math.floor(ctx.sampleRate * duration);
  const buffer = ctx.createBuffer(1, sampleCount, ctx.sampleRate);
  const channel = buffer.getChannelData(0);
  for (let i = 0; i < sampleCount; i++) {
    channel[i] = Math.random() * 2 - 1;
  }

  const source = ctx.createBufferSource();
  source.buffer = buffer;

  const filter = ctx.createBiquadFilter();
  filter.type = 'lowpass';
  filter.frequency.setValueAtTime(cutoff, ctx.currentTime);
  filter.frequency.exponentialRampToValueAtTime(80, ctx.currentTime + duration);

  const gain = ctx.createGain();
  gain.gain.setValueAtTime(gainAmount, ctx.currentTime);
  gain.gain.exponentialRampToValueAtTime(0.01, ctx.currentTime + duration);

  source.connect(filter);
  filter.connect(gain);
  gain.connect(master);

  source.start(ctx.currentTime);
  source.stop(ctx.currentTime + duration);
}

// Drone start - wobbling buzz that fades out
export function playDroneStart() {
  const ctx = getAudioContext();
  if (!ctx || !masterGain || muted) return;

  const osc = ctx.createOscillator();
  const wobble = ctx.createOscillator();
  const wobbleDepth = ctx.createGain();
  const gain = ctx.createGain();

  osc.type = 'sawtooth';
  osc.frequency.setValueAtTime(200, ctx.currentTime);
  wobble.frequency.value = 10 / (Math.PI * 2);
  wobbleDepth.gain.value = 30;
  wobble.connect(wobbleDepth);
  wobbleDepth.connect(osc.frequency);

  gain.gain.setValueAtTime(0.12, ctx.currentTime);
  gain.gain.exponentialRampToValueAtTime(0.01, ctx.currentTime + 0.3);

  osc.connect(gain);
  gain.connect(masterGain);

  osc.start(ctx.currentTime);
  wobble.start(ctx.currentTime);
  osc.stop(ctx.currentTime + 0.3);
  wobble.stop(ctx.currentTime + 0.3);
}

// Drop - short click
export function playDrop() {
  const ctx = getAudioContext();
  if (!ctx || !masterGain || muted) return;

  const osc = ctx.createOscillator();
  const gain = ctx.createGain();

  osc.type = 'sine';
  osc.frequency.setValueAtTime(400, ctx.currentTime);

  gain.gain.setValueAtTime(0.25, ctx.currentTime);
  gain.gain.exponentialRampToValueAtTime(0.01, ctx.currentTime + 0.15);

  osc.connect(gain);
  gain.connect(masterGain);

  osc.start(ctx.currentTime);
  osc.stop(ctx.currentTime + 0.15);
}

// Explosion - low rumble with noise
export function playExplosion() {
  const ctx = getAudioContext();
  if (!ctx || !masterGain || muted) return;

  playNoiseBurst(ctx, masterGain, 0.4, 0.35, 900);

  // Bass thump
  const osc = ctx.createOscillator();
  const oscGain = ctx.createGain();

  osc.type = 'sine';
  osc.frequency.setValueAtTime(100, ctx.currentTime);
  osc.frequency.exponentialRampToValueAtTime(40, ctx.currentTime + 0.3);

  oscGain.gain.setValueAtTime(0.45, ctx.currentTime);
  oscGain.gain.exponentialRampToValueAtTime(0.01, ctx.currentTime + 0.3);

  osc.connect(oscGain);
  oscGain.connect(masterGain);

  osc.start(ctx.currentTime);
  osc.stop(ctx.currentTime + 0.3);
}

// Hit - bright two-tone ping
export function playHit() {
  const ctx = getAudioContext();
  if (!ctx || !masterGain || muted) return;

  const master = masterGain; // Capture for closure
  const partials: Array<[number, number]> = [[800, 0.2], [1200, 0.09]];

  partials.forEach(([freq, level]) => {
    const osc = ctx.createOscillator();
    const gain = ctx.createGain();

    osc.type = 'sine';
    osc.frequency.value = freq;

    gain.gain.setValueAtTime(level, ctx.currentTime);
    gain.gain.exponentialRampToValueAtTime(0.001, ctx.currentTime + 0.2);

    osc.connect(gain);
    gain.connect(master);

    osc.start(ctx.currentTime);
    osc.stop(ctx.currentTime + 0.2);
  });
}

// Upgrade - rising sweep
export function playUpgrade() {
  const ctx = getAudioContext();
  if (!ctx || !masterGain || muted) return;

  const osc = ctx.createOscillator();
  const gain = ctx.createGain();

  osc.type = 'triangle';
  osc.frequency.setValueAtTime(300, ctx.currentTime);
  osc.frequency.linearRampToValueAtTime(500, ctx.currentTime + 0.5);

  gain.gain.setValueAtTime(0.2, ctx.currentTime);
  gain.gain.exponentialRampToValueAtTime(0.01, ctx.currentTime + 0.5);

  osc.connect(gain);
  gain.connect(masterGain);

  osc.start(ctx.currentTime);
  osc.stop(ctx.currentTime + 0.5);
}

// Denied - flat buzz for a purchase the score can't cover
export function playDenied() {
  const ctx = getAudioContext();
  if (!ctx || !masterGain || muted) return;

  const osc = ctx.createOscillator();
  const gain = ctx.createGain();

  osc.type = 'square';
  osc.frequency.setValueAtTime(110, ctx.currentTime);

  gain.gain.setValueAtTime(0.08, ctx.currentTime);
  gain.gain.exponentialRampToValueAtTime(0.01, ctx.currentTime + 0.12);

  osc.connect(gain);
  gain.connect(masterGain);

  osc.start(ctx.currentTime);
  osc.stop(ctx.currentTime + 0.12);
}

export function playEventSounds(events: GameEvent[]) {
  for (const event of events) {
    switch (event.type) {
      case 'drop':
        playDrop();
        break;
      case 'impact':
        playExplosion();
        break;
      case 'target_destroyed':
        playHit();
        break;
      default:
        break;
    }
  }
}
