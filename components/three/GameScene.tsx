'use client';

import { useRef } from 'react';
import { useFrame, useThree } from '@react-three/fiber';
import * as THREE from 'three';
import type { RenderState } from '@/lib/gameEngine';
import { PlayfieldBackground } from './PlayfieldBackground';
import { TargetInstances } from './TargetInstances';
import { BombMarkers } from './BombMarkers';
import { DroneMesh } from './DroneMesh';
import { BlastRings, type Blast } from './BlastRings';

interface GameSceneProps {
  viewRef: React.RefObject<RenderState | null>;
  blastsRef: React.RefObject<Blast[]>;
}

// Offsets all children so game coords (x, -y) align with R3F's centered ortho camera
function SceneRoot({ children }: { children: React.ReactNode }) {
  const groupRef = useRef<THREE.Group>(null);
  const { size } = useThree();

  useFrame(() => {
    if (groupRef.current) {
      groupRef.current.position.set(-size.width / 2, size.height / 2, 0);
    }
  });

  return <group ref={groupRef}>{children}</group>;
}

export function GameScene({ viewRef, blastsRef }: GameSceneProps) {
  return (
    <SceneRoot>
      <PlayfieldBackground viewRef={viewRef} />
      <TargetInstances viewRef={viewRef} />
      <BombMarkers viewRef={viewRef} />
      <BlastRings blastsRef={blastsRef} />
      <DroneMesh viewRef={viewRef} />
    </SceneRoot>
  );
}
