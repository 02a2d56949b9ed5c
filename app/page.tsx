'use client';

import { useState, useCallback } from 'react';
import Game from '@/components/Game';
import { Play } from 'lucide-react';
import { getScoreTableLines } from '@/lib/gameEngine';

type GamePhase = 'menu' | 'playing';

const CONTROLS = [
  ['WASD / Arrows', 'Fly the drone'],
  ['Space', 'Drop a bomb'],
  ['U', 'Open or close upgrades'],
  ['1 / 2 / 3', 'Buy speed, reload, radius'],
  ['Esc', 'Close menu or leave'],
];

export default function Home() {
  const [phase, setPhase] = useState<GamePhase>('menu');

  const handleExit = useCallback(() => {
    setPhase('menu');
  }, []);

  if (phase === 'playing') {
    return <Game onExit={handleExit} />;
  }

  return (
    <div className="min-h-screen bg-brutal-black text-white">
      <div className="flex flex-col items-center justify-start p-4 sm:p-8 min-h-screen">
        <header className="text-center mb-6 sm:mb-10 mt-6 sm:mt-8 w-full max-w-4xl">
          <div className="flex items-center gap-4 mb-4 sm:mb-6">
            <div className="h-[2px] flex-1 bg-gradient-to-r from-transparent via-electric-yellow/50 to-transparent" />
            <span className="text-[10px] sm:text-xs font-mono text-electric-yellow/60 tracking-[0.3em] uppercase">
              Top-down arcade
            </span>
            <div className="h-[2px] flex-1 bg-gradient-to-r from-transparent via-electric-yellow/50 to-transparent" />
          </div>

          <h1 className="brutal-title">DROP ZONE</h1>

          <div className="flex items-center justify-center gap-3 mt-3 sm:mt-4">
            <span className="text-electric-pink font-mono text-lg sm:text-xl">{'//'}</span>
            <p className="font-mono text-xs sm:text-sm tracking-[0.2em] uppercase text-white/70">
              Lead the target <span className="text-electric-cyan">.</span> Time the fall
            </p>
            <span className="text-electric-pink font-mono text-lg sm:text-xl">{'//'}</span>
          </div>
        </header>

        <div className="w-full max-w-2xl grid grid-cols-1 sm:grid-cols-2 gap-6 mb-8">
          <section>
            <div className="flex items-center gap-3 mb-3">
              <span className="font-mono text-xs text-white/40 uppercase tracking-wider">Controls</span>
              <div className="h-[1px] flex-1 bg-white/10" />
            </div>
            <div className="space-y-1 font-mono text-sm">
              {CONTROLS.map(([key, action]) => (
                <div key={key} className="flex justify-between gap-4">
                  <span className="text-electric-cyan">{key}</span>
                  <span className="text-white/60 text-right">{action}</span>
                </div>
              ))}
            </div>
          </section>

          <section>
            <div className="flex items-center gap-3 mb-3">
              <span className="font-mono text-xs text-white/40 uppercase tracking-wider">Targets</span>
              <div className="h-[1px] flex-1 bg-white/10" />
            </div>
            <div className="space-y-1 font-mono text-sm">
              {getScoreTableLines().map(line => (
                <div key={line.label} className="flex justify-between">
                  <span style={{ color: line.color }}>{line.label}</span>
                  <span className="text-white/60">{line.value}</span>
                </div>
              ))}
            </div>
          </section>
        </div>

        <button onClick={() => setPhase('playing')} className="btn-brutal flex items-center gap-3">
          <Play className="w-5 h-5" />
          Launch
        </button>
      </div>
    </div>
  );
}
