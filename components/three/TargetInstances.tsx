'use client';

import { useRef, useMemo } from 'react';
import { useFrame } from '@react-three/fiber';
import * as THREE from 'three';
import type { TargetKind } from '@/types/game';
import { SCORE_TABLE } from '@/types/game';
import type { RenderState } from '@/lib/gameEngine';
import { getThreeColor } from '@/lib/colors';

const MAX_TARGETS = 64;
const dummyObj = new THREE.Object3D();

// Unit-radius shapes, scaled per instance by the target radius
function createShapeGeometry(kind: TargetKind): THREE.BufferGeometry {
  switch (kind) {
    case 'scout':
      return new THREE.CircleGeometry(1, 24);
    case 'tent':
      return new THREE.PlaneGeometry(2, 2);
    case 'ammo': {
      const pts = [
        new THREE.Vector2(0, -1),
        new THREE.Vector2(1, 0),
        new THREE.Vector2(0, 1),
        new THREE.Vector2(-1, 0),
      ];
      return new THREE.ShapeGeometry(new THREE.Shape(pts));
    }
    case 'vehicle':
      return new THREE.PlaneGeometry(2, 1);
    default: {
      const unknown: never = kind;
      return unknown;
    }
  }
}

interface TargetInstancesProps {
  viewRef: React.RefObject<RenderState | null>;
}

export function TargetInstances({ viewRef }: TargetInstancesProps) {
  const meshRefs = useRef<Partial<Record<TargetKind, THREE.InstancedMesh | null>>>({});

  const geometries = useMemo<Record<TargetKind, THREE.BufferGeometry>>(() => ({
    scout: createShapeGeometry('scout'),
    tent: createShapeGeometry('tent'),
    ammo: createShapeGeometry('ammo'),
    vehicle: createShapeGeometry('vehicle'),
  }), []);

  const material = useMemo(() => new THREE.MeshBasicMaterial({ side: THREE.DoubleSide }), []);

  useFrame(() => {
    const view = viewRef.current;
    if (!view) return;

    for (const kind of SCORE_TABLE) {
      const mesh = meshRefs.current[kind];
      if (!mesh) continue;

      let count = 0;
      for (const target of view.targets) {
        if (target.kind !== kind || count >= MAX_TARGETS) continue;
        dummyObj.position.set(target.position.x, -target.position.y, 3);
        dummyObj.scale.set(target.radius, target.radius, 1);
        dummyObj.updateMatrix();
        mesh.setMatrixAt(count, dummyObj.matrix);
        mesh.setColorAt(count, getThreeColor(target.color));
        count++;
      }

      mesh.count = count;
      mesh.instanceMatrix.needsUpdate = true;
      if (mesh.instanceColor) mesh.instanceColor.needsUpdate = true;
    }
  });

  return (
    <>
      {SCORE_TABLE.map(kind => (
        <instancedMesh
          key={kind}
          ref={(mesh) => { meshRefs.current[kind] = mesh; }}
          args={[geometries[kind], material, MAX_TARGETS]}
          frustumCulled={false}
        >
          <instancedBufferAttribute attach="instanceColor" args={[new Float32Array(MAX_TARGETS * 3), 3]} />
        </instancedMesh>
      ))}
    </>
  );
}
