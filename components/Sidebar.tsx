'use client';

import { Volume2, VolumeX } from 'lucide-react';
import type { RenderState } from '@/lib/gameEngine';
import { getStatLines, getSessionLines, getScoreTableLines } from '@/lib/gameEngine';

interface SidebarProps {
  view: RenderState | null;
  soundEnabled: boolean;
  onToggleSound: () => void;
}

const CONTROLS = [
  ['WASD / Arrows', 'Fly'],
  ['Space', 'Drop'],
  ['U', 'Upgrades'],
  ['Esc', 'Close menu / exit'],
];

export default function Sidebar({ view, soundEnabled, onToggleSound }: SidebarProps) {
  const scoreTable = getScoreTableLines();

  return (
    <aside className="w-80 shrink-0 h-full overflow-y-auto border-l-2 border-white/10 bg-brutal-dark p-4 font-mono text-sm">
      <div className="flex items-center justify-between mb-1">
        <h2 className="font-display text-2xl text-white">DROP ZONE</h2>
        <button
          onClick={onToggleSound}
          className="text-white/40 hover:text-electric-cyan transition-colors"
          aria-label={soundEnabled ? 'Mute' : 'Unmute'}
        >
          {soundEnabled ? <Volume2 className="w-5 h-5" /> : <VolumeX className="w-5 h-5" />}
        </button>
      </div>

      <div className="font-display text-3xl text-electric-yellow mb-6">
        {view ? view.score.toLocaleString() : 0}
        <span className="ml-2 text-xs font-mono text-white/40 uppercase">pts</span>
      </div>

      {view && (
        <div className="space-y-1 mb-6">
          {getStatLines(view).map(line => (
            <div key={line.label} className="flex justify-between">
              <span className="text-white/60">{line.label}</span>
              <span className={line.value === 'READY' ? 'text-electric-green' : 'text-white'}>{line.value}</span>
            </div>
          ))}
        </div>
      )}

      <div className="text-xs uppercase tracking-wider text-white/40 mb-2">Score table</div>
      <div className="space-y-1 mb-6">
        {scoreTable.map(line => (
          <div key={line.label} className="flex items-center gap-2">
            <span className="inline-block w-3 h-3 rounded-full" style={{ backgroundColor: line.color }} />
            <span className="text-white/80 flex-1">{line.label}</span>
            <span className="text-white">{line.value}</span>
          </div>
        ))}
      </div>

      {view && (
        <>
          <div className="text-xs uppercase tracking-wider text-white/40 mb-2">Session</div>
          <div className="space-y-1 mb-6">
            {getSessionLines(view).map(line => (
              <div key={line.label} className="flex justify-between">
                <span className="text-white/60">{line.label}</span>
                <span className="text-white">{line.value}</span>
              </div>
            ))}
          </div>
        </>
      )}

      <div className="text-xs uppercase tracking-wider text-white/40 mb-2">Controls</div>
      <div className="space-y-1">
        {CONTROLS.map(([key, action]) => (
          <div key={key} className="flex justify-between text-xs">
            <span className="text-electric-cyan">{key}</span>
            <span className="text-white/60">{action}</span>
          </div>
        ))}
      </div>
    </aside>
  );
}
