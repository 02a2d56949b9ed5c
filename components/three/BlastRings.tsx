'use client';

import { useRef, useMemo } from 'react';
import { useFrame } from '@react-three/fiber';
import * as THREE from 'three';
import type { Vector2 } from '@/types/game';
import { COLORS } from '@/lib/colors';

const MAX_BLASTS = 32;
const BLAST_LIFE = 0.45; // seconds
const dummyObj = new THREE.Object3D();
const tmpColor = new THREE.Color();

export interface Blast {
  position: Vector2;
  radius: number;
  age: number;
}

interface BlastRingsProps {
  blastsRef: React.RefObject<Blast[]>;
}

export function BlastRings({ blastsRef }: BlastRingsProps) {
  const ringRef = useRef<THREE.InstancedMesh>(null);

  const ringGeo = useMemo(() => new THREE.RingGeometry(0.9, 1, 48), []);
  const ringMat = useMemo(() => new THREE.MeshBasicMaterial({ side: THREE.DoubleSide }), []);
  const hot = useMemo(() => new THREE.Color(COLORS.orange), []);
  const cold = useMemo(() => new THREE.Color(COLORS.field), []);

  useFrame((_, delta) => {
    const blasts = blastsRef.current;
    const mesh = ringRef.current;
    if (!blasts || !mesh) return;

    // Age in place and drop finished rings
    let write = 0;
    for (const blast of blasts) {
      blast.age += delta;
      if (blast.age < BLAST_LIFE) blasts[write++] = blast;
    }
    blasts.length = write;

    const count = Math.min(blasts.length, MAX_BLASTS);
    for (let i = 0; i < count; i++) {
      const blast = blasts[i];
      const t = blast.age / BLAST_LIFE;
      const r = blast.radius * (0.4 + 0.6 * t);
      dummyObj.position.set(blast.position.x, -blast.position.y, 5);
      dummyObj.scale.set(r, r, 1);
      dummyObj.updateMatrix();
      mesh.setMatrixAt(i, dummyObj.matrix);
      tmpColor.copy(hot).lerp(cold, t);
      mesh.setColorAt(i, tmpColor);
    }

    mesh.count = count;
    mesh.instanceMatrix.needsUpdate = true;
    if (mesh.instanceColor) mesh.instanceColor.needsUpdate = true;
  });

  return (
    <instancedMesh ref={ringRef} args={[ringGeo, ringMat, MAX_BLASTS]} frustumCulled={false}>
      <instancedBufferAttribute attach="instanceColor" args={[new Float32Array(MAX_BLASTS * 3), 3]} />
    </instancedMesh>
  );
}
