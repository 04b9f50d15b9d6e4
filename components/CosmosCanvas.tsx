import React, { useEffect, useMemo, useRef, useState } from 'react';
import { Canvas, useThree, type ThreeEvent } from '@react-three/fiber';
import { Circle, Line, OrthographicCamera, Ring } from '@react-three/drei';
import * as THREE from 'three';
import type { EpochDescriptor, ObjectKind, Scene, SceneBoundary, SceneObject, SimulationState, ViewTransform } from '../types';
import { EPOCHS } from '../constants';
import { renderClassOf } from '../utils/cosmology';
import { buildEpochScene, buildExplorerScene, ensureComovingField, type ComovingField } from '../utils/scene';
import { SpriteCache, type SpriteSet } from '../utils/assets';
import { isNavigable, panBy, viewForMode, wheelFactor, zoomAt } from '../utils/view';

interface CosmosCanvasProps {
  state: SimulationState;
  descriptor: EpochDescriptor;
  updateView: (update: (view: ViewTransform) => ViewTransform) => void;
  onIdentify: (kind: ObjectKind) => void;
}

const spriteCache = new SpriteCache();

const BOUNDARY_SEGMENTS = 96;

const Boundary: React.FC<{ boundary: SceneBoundary }> = ({ boundary }) => {
  const points = useMemo(() => {
    const pts: [number, number, number][] = [];
    for (let i = 0; i <= BOUNDARY_SEGMENTS; i++) {
      const a = (i / BOUNDARY_SEGMENTS) * Math.PI * 2;
      pts.push([boundary.radius * Math.cos(a), boundary.radius * Math.sin(a), 0]);
    }
    return pts;
  }, [boundary.radius]);

  return (
    <Line
      points={points}
      color={boundary.color}
      lineWidth={boundary.dashed ? 1 : 1.5}
      dashed={boundary.dashed ?? false}
      dashSize={4}
      gapSize={2}
    />
  );
};

const CosmicObject: React.FC<{
  object: SceneObject;
  sprites: SpriteSet;
  onIdentify: (kind: ObjectKind) => void;
}> = ({ object, sprites, onIdentify }) => {
  const identify = (e: ThreeEvent<MouseEvent>) => {
    e.stopPropagation();
    e.nativeEvent.preventDefault();
    onIdentify(object.kind);
  };

  const sprite = object.kind === 'galaxy' || object.kind === 'star' ? sprites[object.kind] : undefined;
  if (sprite) {
    return (
      <sprite position={[object.x, object.y, 1]} scale={[sprite.size, sprite.size, 1]} onContextMenu={identify}>
        <spriteMaterial map={sprite.texture} transparent />
      </sprite>
    );
  }

  return (
    <group position={[object.x, object.y, 1]} onContextMenu={identify}>
      <Circle args={[object.radius, 16]}>
        <meshBasicMaterial color={object.color} />
      </Circle>
      {object.outline && (
        <Ring args={[object.radius, object.radius + 1, 24]}>
          <meshBasicMaterial color={object.outline} side={THREE.DoubleSide} />
        </Ring>
      )}
    </group>
  );
};

/**
 * Builds the scene for the current mode at the canvas size. The comoving
 * field survives slider moves so structures keep their places while the
 * universe expands.
 */
const SceneContent: React.FC<{
  state: SimulationState;
  descriptor: EpochDescriptor;
  sprites: SpriteSet;
  onIdentify: (kind: ObjectKind) => void;
}> = ({ state, descriptor, sprites, onIdentify }) => {
  const size = useThree((s) => s.size);
  const fieldRef = useRef<ComovingField | null>(null);

  const scene: Scene = useMemo(() => {
    const viewport = { width: size.width, height: size.height };
    if (state.mode === 'stepper') {
      const epoch = EPOCHS[Math.min(Math.max(state.epochIndex, 0), EPOCHS.length - 1)];
      return buildEpochScene(epoch, viewport, state.seed);
    }
    if (renderClassOf(descriptor.phase) === 'structures') {
      fieldRef.current = ensureComovingField(fieldRef.current, descriptor.timeYears, viewport, state.seed);
    }
    return buildExplorerScene(descriptor, viewport, fieldRef.current, state.seed);
  }, [state.mode, state.epochIndex, state.seed, descriptor, size.width, size.height]);

  const objectSprites = state.mode === 'explorer' ? sprites : {};

  return (
    <>
      <color attach="background" args={[scene.background]} />
      {scene.boundary && <Boundary boundary={scene.boundary} />}
      {scene.objects.map((o) => (
        <CosmicObject key={o.id} object={o} sprites={objectSprites} onIdentify={onIdentify} />
      ))}
    </>
  );
};

export const CosmosCanvas: React.FC<CosmosCanvasProps> = ({ state, descriptor, updateView, onIdentify }) => {
  const [sprites, setSprites] = useState<SpriteSet>({});
  const dragRef = useRef<{ x: number; y: number } | null>(null);

  useEffect(() => {
    let cancelled = false;
    spriteCache.loadAll().then(
      (loaded) => {
        if (!cancelled) setSprites(loaded);
      },
      (error: unknown) => console.error('[assets] sprite loading failed', error),
    );
    return () => {
      cancelled = true;
    };
  }, []);

  const onPointerDown = (e: React.PointerEvent<HTMLDivElement>) => {
    if (e.button !== 0 || !isNavigable(state.mode)) return;
    dragRef.current = { x: e.clientX, y: e.clientY };
  };

  const onPointerMove = (e: React.PointerEvent<HTMLDivElement>) => {
    const start = dragRef.current;
    if (!start) return;
    const dx = e.clientX - start.x;
    const dy = e.clientY - start.y;
    dragRef.current = { x: e.clientX, y: e.clientY };
    updateView((view) => panBy(view, dx, dy));
  };

  const endDrag = () => {
    dragRef.current = null;
  };

  const onWheel = (e: React.WheelEvent<HTMLDivElement>) => {
    if (!isNavigable(state.mode)) return;
    const factor = wheelFactor(e.deltaY);
    if (factor === null) return;
    const rect = e.currentTarget.getBoundingClientRect();
    const offsetX = e.clientX - rect.left - rect.width / 2;
    const offsetY = e.clientY - rect.top - rect.height / 2;
    updateView((view) => zoomAt(view, factor, offsetX, offsetY));
  };

  const view = viewForMode(state.mode, state.view);

  return (
    <div
      className="absolute inset-0 z-0 bg-black cursor-grab active:cursor-grabbing"
      onPointerDown={onPointerDown}
      onPointerMove={onPointerMove}
      onPointerUp={endDrag}
      onPointerLeave={endDrag}
      onWheel={onWheel}
      onContextMenu={(e) => e.preventDefault()}
    >
      <Canvas dpr={[1, 2]} gl={{ antialias: true }}>
        <OrthographicCamera
          makeDefault
          position={[view.centerX, view.centerY, 100]}
          zoom={view.zoom}
          near={0.1}
          far={1000}
        />
        <SceneContent state={state} descriptor={descriptor} sprites={sprites} onIdentify={onIdentify} />
      </Canvas>
    </div>
  );
};
