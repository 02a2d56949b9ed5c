'use client';

import { useRef, useState } from 'react';
import { Bomb, Wrench } from 'lucide-react';
import type { MovementIntent } from '@/types/game';

interface TouchControlsProps {
  onStick: (intent: MovementIntent | null) => void;
  onDrop: () => void;
  onToggleUpgrades: () => void;
}

const STICK_RADIUS = 56;

export default function TouchControls({ onStick, onDrop, onToggleUpgrades }: TouchControlsProps) {
  const baseRef = useRef<HTMLDivElement>(null);
  const [knob, setKnob] = useState<MovementIntent | null>(null);

  const updateStick = (clientX: number, clientY: number) => {
    const base = baseRef.current;
    if (!base) return;
    const rect = base.getBoundingClientRect();
    let dx = clientX - (rect.left + rect.width / 2);
    let dy = clientY - (rect.top + rect.height / 2);
    const mag = Math.hypot(dx, dy);
    if (mag > STICK_RADIUS) {
      dx = (dx / mag) * STICK_RADIUS;
      dy = (dy / mag) * STICK_RADIUS;
    }
    const offset = { x: dx / STICK_RADIUS, y: dy / STICK_RADIUS };
    setKnob(offset);
    onStick(offset);
  };

  const releaseStick = () => {
    setKnob(null);
    onStick(null);
  };

  return (
    <div className="absolute inset-0 pointer-events-none z-20 select-none">
      <div
        ref={baseRef}
        className="absolute bottom-6 left-6 rounded-full border-2 border-white/30 bg-white/5 pointer-events-auto touch-none"
        style={{ width: STICK_RADIUS * 2, height: STICK_RADIUS * 2 }}
        onPointerDown={(e) => {
          e.currentTarget.setPointerCapture(e.pointerId);
          updateStick(e.clientX, e.clientY);
        }}
        onPointerMove={(e) => {
          if (knob) updateStick(e.clientX, e.clientY);
        }}
        onPointerUp={releaseStick}
        onPointerCancel={releaseStick}
      >
        <div
          className="absolute w-10 h-10 rounded-full bg-white/80"
          style={{
            left: STICK_RADIUS - 20 + (knob ? knob.x * STICK_RADIUS * 0.7 : 0),
            top: STICK_RADIUS - 20 + (knob ? knob.y * STICK_RADIUS * 0.7 : 0),
          }}
        />
      </div>

      <button
        className="absolute bottom-6 right-6 w-20 h-20 flex items-center justify-center border-2 border-white bg-electric-pink/40 active:bg-electric-pink pointer-events-auto"
        onPointerDown={onDrop}
        aria-label="Drop bomb"
      >
        <Bomb className="w-8 h-8" />
      </button>

      <button
        className="absolute top-4 right-6 w-14 h-14 flex items-center justify-center border-2 border-white bg-electric-yellow/30 active:bg-electric-yellow pointer-events-auto"
        onPointerDown={onToggleUpgrades}
        aria-label="Upgrades"
      >
        <Wrench className="w-6 h-6" />
      </button>
    </div>
  );
}
