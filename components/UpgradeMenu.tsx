'use client';

import type { UpgradeKind } from '@/types/game';
import type { UpgradeOption } from '@/lib/gameEngine';

interface UpgradeMenuProps {
  options: UpgradeOption[];
  score: number;
  notice: string | null;
  onBuy: (kind: UpgradeKind) => void;
  onClose: () => void;
}

export default function UpgradeMenu({ options, score, notice, onBuy, onClose }: UpgradeMenuProps) {
  return (
    <div className="absolute inset-0 flex items-center justify-center bg-brutal-black/80 z-30">
      <div className="w-full max-w-xl bg-brutal-dark border-2 border-white/20 p-6">
        <div className="flex items-baseline justify-between mb-2">
          <div className="font-display text-2xl text-electric-cyan">UPGRADES</div>
          <div className="font-mono text-sm text-electric-yellow">{score.toLocaleString()} pts</div>
        </div>
        <p className="font-mono text-xs text-white/40 mb-6">Press 1 / 2 / 3 to buy. U or Esc closes.</p>

        <div className="space-y-3">
          {options.map(option => (
            <button
              key={option.kind}
              onClick={() => onBuy(option.kind)}
              className={`w-full flex items-center gap-4 p-3 border-2 text-left transition-all ${
                option.affordable
                  ? 'border-white/30 hover:border-electric-cyan'
                  : 'border-white/10 opacity-50'
              }`}
            >
              <span className="font-mono text-electric-cyan">[{option.hotkey}]</span>
              <span className="text-2xl">{option.icon}</span>
              <div className="flex-1">
                <div className="font-display text-lg" style={{ color: option.color }}>
                  {option.name}
                  <span className="ml-2 font-mono text-xs text-white/40">Lv {option.level}</span>
                </div>
                <div className="font-mono text-xs text-white/60">
                  {option.capped ? 'Maxed out' : option.description}
                </div>
              </div>
              <span className="font-mono text-sm text-white">{option.cost}</span>
            </button>
          ))}
        </div>

        {notice && (
          <div className="mt-4 font-mono text-xs text-electric-pink">{notice}</div>
        )}

        <p className="mt-6 font-mono text-xs text-white/40">
          Bombs take about half a second to fall. Drop a little ahead of moving targets.
        </p>

        <button onClick={onClose} className="mt-4 w-full btn-brutal-outline">
          Close
        </button>
      </div>
    </div>
  );
}
