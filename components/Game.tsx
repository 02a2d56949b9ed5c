'use client';

import { useEffect, useRef, useState, useCallback } from 'react';
import { Canvas } from '@react-three/fiber';
import type { MovementIntent, SimulationState, UpgradeKind } from '@/types/game';
import {
  newSession,
  createBounds,
  tick,
  toggleUpgradeMenu,
  closeUpgradeMenu,
  requestUpgrade,
  getUpgradeOptions,
  getUpgradeKindForHotkey,
  getMovementIntent,
  serializeForRender,
  createAccumulator,
  advanceAccumulator,
  FIXED_DT,
  createBanner,
  bannerForEvents,
  updateBanner,
} from '@/lib/gameEngine';
import type { RenderState, UpgradeOption, MessageBanner } from '@/lib/gameEngine';
import {
  playEventSounds,
  playDroneStart,
  playUpgrade,
  playDenied,
  setMuted,
  isMuted,
} from '@/lib/audio';
import { GameScene } from './three/GameScene';
import type { Blast } from './three/BlastRings';
import Sidebar from './Sidebar';
import UpgradeMenu from './UpgradeMenu';
import TouchControls from './TouchControls';

interface GameProps {
  onExit: () => void;
}

export default function Game({ onExit }: GameProps) {
  const fieldRef = useRef<HTMLDivElement>(null);
  const stateRef = useRef<SimulationState | null>(null);
  const viewRef = useRef<RenderState | null>(null);
  const blastsRef = useRef<Blast[]>([]);
  const bannerRef = useRef<MessageBanner | null>(null);
  const animationFrameRef = useRef<number>(0);
  const inputRef = useRef<{ keys: Set<string>; stick: MovementIntent | null; dropQueued: boolean }>({
    keys: new Set(),
    stick: null,
    dropQueued: false,
  });

  const [dimensions, setDimensions] = useState<{ width: number; height: number } | null>(null);
  const [displayView, setDisplayView] = useState<RenderState | null>(null);
  const [banner, setBanner] = useState<MessageBanner | null>(null);
  const [menuOpen, setMenuOpen] = useState(false);
  const [upgradeOptions, setUpgradeOptions] = useState<UpgradeOption[]>([]);
  const [upgradeNotice, setUpgradeNotice] = useState<string | null>(null);
  const [soundEnabled, setSoundEnabled] = useState(() => !isMuted());
  const [isTouch, setIsTouch] = useState(false);

  // Playfield size is fixed for the whole session once measured
  useEffect(() => {
    if (fieldRef.current) {
      const rect = fieldRef.current.getBoundingClientRect();
      setDimensions({ width: Math.floor(rect.width), height: Math.floor(rect.height) });
    }
    setIsTouch(window.matchMedia('(pointer: coarse)').matches);
  }, []);

  // Initialize game once per mount; strict mode re-runs effects in development
  useEffect(() => {
    if (!dimensions || dimensions.width <= 0 || dimensions.height <= 0) return;
    if (stateRef.current) return;

    const state = newSession(createBounds(0, 0, dimensions.width, dimensions.height));
    stateRef.current = state;
    viewRef.current = serializeForRender(state);
    setDisplayView(viewRef.current);

    bannerRef.current = createBanner('start');
    setBanner(bannerRef.current);
    playDroneStart();
    console.log(`Session started on a ${dimensions.width}x${dimensions.height} playfield`);
  }, [dimensions]);

  const refreshMenu = useCallback(() => {
    const state = stateRef.current;
    if (!state) return;
    setMenuOpen(state.mode === 'upgrade_menu');
    setUpgradeOptions(getUpgradeOptions(state));
    setDisplayView(serializeForRender(state));
  }, []);

  const handleToggleMenu = useCallback(() => {
    const state = stateRef.current;
    if (!state) return;
    toggleUpgradeMenu(state);
    setUpgradeNotice(null);
    refreshMenu();
  }, [refreshMenu]);

  const handleCloseMenu = useCallback(() => {
    const state = stateRef.current;
    if (!state) return;
    closeUpgradeMenu(state);
    refreshMenu();
  }, [refreshMenu]);

  const handleUpgrade = useCallback((kind: UpgradeKind) => {
    const state = stateRef.current;
    if (!state) return;

    const result = requestUpgrade(state, kind);
    if (result.status === 'applied') {
      playUpgrade();
      setUpgradeNotice(null);
      bannerRef.current = createBanner('upgrade');
      setBanner(bannerRef.current);
    } else {
      playDenied();
      setUpgradeNotice(`Not enough points: need ${result.cost}, have ${result.score}.`);
    }
    refreshMenu();
  }, [refreshMenu]);

  const handleToggleSound = useCallback(() => {
    setSoundEnabled(s => {
      setMuted(s);
      return !s;
    });
  }, []);

  // Handle input
  useEffect(() => {
    const handleKeyDown = (e: KeyboardEvent) => {
      const key = e.key.toLowerCase();
      const state = stateRef.current;

      if (key === ' ' || key.startsWith('arrow')) e.preventDefault();

      if (key === 'escape') {
        if (state?.mode === 'upgrade_menu') handleCloseMenu();
        else onExit();
        return;
      }
      if (key === 'u') {
        handleToggleMenu();
        return;
      }
      if (state?.mode === 'upgrade_menu') {
        const kind = getUpgradeKindForHotkey(key);
        if (kind) handleUpgrade(kind);
        return;
      }
      if (key === ' ' && !e.repeat) {
        inputRef.current.dropQueued = true;
      }
      inputRef.current.keys.add(key);
    };

    const handleKeyUp = (e: KeyboardEvent) => {
      inputRef.current.keys.delete(e.key.toLowerCase());
    };

    const handleBlur = () => {
      inputRef.current.keys.clear();
    };

    window.addEventListener('keydown', handleKeyDown);
    window.addEventListener('keyup', handleKeyUp);
    window.addEventListener('blur', handleBlur);

    return () => {
      window.removeEventListener('keydown', handleKeyDown);
      window.removeEventListener('keyup', handleKeyUp);
      window.removeEventListener('blur', handleBlur);
    };
  }, [handleToggleMenu, handleCloseMenu, handleUpgrade, onExit]);

  // Game loop
  useEffect(() => {
    if (!dimensions) return;

    let acc = createAccumulator(performance.now());
    let lastDisplayUpdate = 0;

    const gameLoop = (timestamp: number) => {
      const state = stateRef.current;
      if (!state) {
        animationFrameRef.current = requestAnimationFrame(gameLoop);
        return;
      }

      const advanced = advanceAccumulator(acc, timestamp);
      acc = advanced.acc;

      const input = inputRef.current;
      for (let i = 0; i < advanced.tickCount; i++) {
        const result = tick(state, FIXED_DT, {
          move: getMovementIntent(input.keys, input.stick),
          dropRequested: input.dropQueued,
        });
        input.dropQueued = false;
        viewRef.current = result.view;

        if (result.events.length > 0) {
          playEventSounds(result.events);
          for (const event of result.events) {
            if (event.type === 'impact') {
              blastsRef.current.push({ position: event.position, radius: event.radius, age: 0 });
            }
          }
          const next = bannerForEvents(result.events);
          if (next) bannerRef.current = next;
        }
      }

      const hadBanner = bannerRef.current !== null;
      bannerRef.current = updateBanner(bannerRef.current, advanced.tickCount * FIXED_DT);

      // Update display state periodically
      if (timestamp - lastDisplayUpdate > 100 || (hadBanner && !bannerRef.current)) {
        lastDisplayUpdate = timestamp;
        setDisplayView(viewRef.current);
        setBanner(bannerRef.current);
        // Impacts keep scoring while the menu is open
        if (state.mode === 'upgrade_menu') {
          setUpgradeOptions(getUpgradeOptions(state));
        }
      }

      animationFrameRef.current = requestAnimationFrame(gameLoop);
    };

    animationFrameRef.current = requestAnimationFrame(gameLoop);

    return () => {
      cancelAnimationFrame(animationFrameRef.current);
    };
  }, [dimensions]);

  return (
    <div className="fixed inset-0 bg-brutal-black flex">
      <div ref={fieldRef} className="flex-1 relative overflow-hidden">
        {dimensions && (
          <Canvas
            orthographic
            camera={{ position: [0, 0, 100], zoom: 1 }}
            style={{ width: dimensions.width, height: dimensions.height }}
          >
            <GameScene viewRef={viewRef} blastsRef={blastsRef} />
          </Canvas>
        )}

        {banner && (
          <div className="absolute top-6 left-1/2 -translate-x-1/2 px-4 py-2 bg-brutal-black/70 font-mono text-sm italic text-electric-cyan pointer-events-none z-10">
            {banner.text}
          </div>
        )}

        {menuOpen && displayView && (
          <UpgradeMenu
            options={upgradeOptions}
            score={displayView.score}
            notice={upgradeNotice}
            onBuy={handleUpgrade}
            onClose={handleCloseMenu}
          />
        )}

        {isTouch && (
          <TouchControls
            onStick={(intent) => { inputRef.current.stick = intent; }}
            onDrop={() => { inputRef.current.dropQueued = true; }}
            onToggleUpgrades={handleToggleMenu}
          />
        )}

        <button
          onClick={onExit}
          className="absolute top-3 left-3 font-mono text-xs uppercase tracking-wider text-white/40 hover:text-electric-pink transition-colors z-10"
        >
          {'<--'} EXIT
        </button>
      </div>

      <Sidebar view={displayView} soundEnabled={soundEnabled} onToggleSound={handleToggleSound} />
    </div>
  );
}
