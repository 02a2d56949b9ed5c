'use client';

import { useRef, useMemo } from 'react';
import { useFrame } from '@react-three/fiber';
import * as THREE from 'three';
import type { RenderState } from '@/lib/gameEngine';
import { COLORS } from '@/lib/colors';

const MAX_BOMBS = 32;
const dummyObj = new THREE.Object3D();

interface BombMarkersProps {
  viewRef: React.RefObject<RenderState | null>;
}

// Falling bombs draw as an "altitude ring" that shrinks toward impact
export function BombMarkers({ viewRef }: BombMarkersProps) {
  const ringRef = useRef<THREE.InstancedMesh>(null);

  const ringGeo = useMemo(() => new THREE.RingGeometry(0.85, 1, 32), []);
  const ringMat = useMemo(() => new THREE.MeshBasicMaterial({
    color: new THREE.Color(COLORS.white),
    side: THREE.DoubleSide,
  }), []);

  useFrame(() => {
    const view = viewRef.current;
    const mesh = ringRef.current;
    if (!view || !mesh) return;

    const count = Math.min(view.bombs.length, MAX_BOMBS);
    for (let i = 0; i < count; i++) {
      const bomb = view.bombs[i];
      const r = 6 + 18 * bomb.altitude;
      dummyObj.position.set(bomb.position.x, -bomb.position.y, 4);
      dummyObj.scale.set(r, r, 1);
      dummyObj.updateMatrix();
      mesh.setMatrixAt(i, dummyObj.matrix);
    }

    mesh.count = count;
    mesh.instanceMatrix.needsUpdate = true;
  });

  return <instancedMesh ref={ringRef} args={[ringGeo, ringMat, MAX_BOMBS]} frustumCulled={false} />;
}
