'use client';

import { useRef, useMemo } from 'react';
import { useFrame } from '@react-three/fiber';
import * as THREE from 'three';
import type { RenderState } from '@/lib/gameEngine';
import { COLORS } from '@/lib/colors';

const GRID_SPACING = 40;

interface PlayfieldBackgroundProps {
  viewRef: React.RefObject<RenderState | null>;
}

function createGridGeometry(width: number, height: number): THREE.BufferGeometry {
  const points: THREE.Vector3[] = [];
  for (let x = GRID_SPACING; x < width; x += GRID_SPACING) {
    points.push(new THREE.Vector3(x, 0, 0), new THREE.Vector3(x, -height, 0));
  }
  for (let y = GRID_SPACING; y < height; y += GRID_SPACING) {
    points.push(new THREE.Vector3(0, -y, 0), new THREE.Vector3(width, -y, 0));
  }
  return new THREE.BufferGeometry().setFromPoints(points);
}

export function PlayfieldBackground({ viewRef }: PlayfieldBackgroundProps) {
  const fieldRef = useRef<THREE.Mesh>(null);
  const gridRef = useRef<THREE.LineSegments>(null);
  const sizeRef = useRef({ width: 0, height: 0 });

  const fieldMat = useMemo(() => new THREE.MeshBasicMaterial({ color: new THREE.Color(COLORS.field) }), []);
  const gridMat = useMemo(() => new THREE.LineBasicMaterial({
    color: new THREE.Color(COLORS.grid),
    transparent: true,
    opacity: 0.6,
  }), []);

  useFrame(() => {
    const view = viewRef.current;
    if (!view || !fieldRef.current || !gridRef.current) return;

    const { left, top, right, bottom } = view.bounds;
    const width = right - left;
    const height = bottom - top;

    fieldRef.current.position.set(left + width / 2, -(top + height / 2), 0);
    fieldRef.current.scale.set(width, height, 1);

    // Grid geometry only changes with the playfield size
    if (sizeRef.current.width !== width || sizeRef.current.height !== height) {
      sizeRef.current = { width, height };
      gridRef.current.geometry.dispose();
      gridRef.current.geometry = createGridGeometry(width, height);
    }
    gridRef.current.position.set(left, -top, 1);
  });

  return (
    <>
      <mesh ref={fieldRef} material={fieldMat}>
        <planeGeometry args={[1, 1]} />
      </mesh>
      <lineSegments ref={gridRef} material={gridMat} />
    </>
  );
}
