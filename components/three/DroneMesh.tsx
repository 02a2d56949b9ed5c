'use client';

import { useRef, useMemo } from 'react';
import { useFrame } from '@react-three/fiber';
import * as THREE from 'three';
import type { RenderState } from '@/lib/gameEngine';
import { COLORS } from '@/lib/colors';

interface DroneMeshProps {
  viewRef: React.RefObject<RenderState | null>;
}

function createCircleLineGeometry(segments: number): THREE.BufferGeometry {
  const points: THREE.Vector3[] = [];
  for (let i = 0; i <= segments; i++) {
    const angle = (i / segments) * Math.PI * 2;
    points.push(new THREE.Vector3(Math.cos(angle), Math.sin(angle), 0));
  }
  return new THREE.BufferGeometry().setFromPoints(points);
}

export function DroneMesh({ viewRef }: DroneMeshProps) {
  const groupRef = useRef<THREE.Group>(null);
  const headingRef = useRef<THREE.Mesh>(null);
  const previewRef = useRef<THREE.LineLoop>(null);

  const bodyGeo = useMemo(() => new THREE.CircleGeometry(9, 24), []);
  // Heading bar starts at the drone center
  const headingGeo = useMemo(() => new THREE.PlaneGeometry(16, 3).translate(8, 0, 0), []);
  const previewGeo = useMemo(() => createCircleLineGeometry(64), []);

  const bodyMat = useMemo(() => new THREE.MeshBasicMaterial({ color: new THREE.Color(COLORS.white) }), []);
  const previewMat = useMemo(() => new THREE.LineBasicMaterial({
    color: new THREE.Color(COLORS.white),
    transparent: true,
    opacity: 0.25,
  }), []);

  useFrame(() => {
    const view = viewRef.current;
    if (!view || !groupRef.current) return;

    const { drone } = view;
    groupRef.current.position.set(drone.position.x, -drone.position.y, 6);

    if (headingRef.current) {
      headingRef.current.rotation.set(0, 0, -drone.heading);
    }

    // Blast radius preview as a timing aid
    if (previewRef.current) {
      previewRef.current.scale.set(drone.bombRadius, drone.bombRadius, 1);
      previewMat.opacity = drone.canDrop ? 0.35 : 0.12;
    }
  });

  return (
    <group ref={groupRef}>
      <lineLoop ref={previewRef} geometry={previewGeo} material={previewMat} />
      <mesh geometry={bodyGeo} material={bodyMat} />
      <mesh ref={headingRef} geometry={headingGeo} material={bodyMat} />
    </group>
  );
}
